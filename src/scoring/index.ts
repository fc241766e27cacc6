export { solveAssignment, type Assignment, type Matrix } from './assignment.js';
export { buildCostMatrix, scorePair, isPresent, TIE_BREAK_PENALTY, type CostMatrix, type PairScore } from './cost-matrix.js';
export { classify, normalizeScore, type Thresholds } from './classify.js';
