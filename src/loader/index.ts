export { loadSuite, parseSuite, createCritic, loadToolCallScript, type LoadSuiteOptions } from './suite-loader.js';
export type { CaseDefinition, CriticDefinition, SuiteFile } from './schema.js';
