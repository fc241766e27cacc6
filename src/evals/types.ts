export type ToolArgs = Record<string, unknown>;

export interface ExpectedToolCall {
  readonly name: string;
  readonly args: Readonly<ToolArgs>;
}

export interface ActualToolCall {
  name: string;
  args: ToolArgs;
}

export type Classification = 'FAIL' | 'WARN' | 'PASS';

export const MISSING_TOOL_CALL_FIELD = 'missing_tool_call';
export const EXTRA_TOOL_CALL_FIELD = 'extra_tool_call';

export interface FieldResult {
  field: string;
  expected: unknown;
  actual: unknown;
  matched: boolean;
  score: number;
  weight: number;
}

export interface EvaluationResult {
  /** Normalized score in [0, 1]. */
  score: number;
  classification: Classification;
  fieldResults: FieldResult[];
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ToolDefinition {
  name: string;
  description?: string;
  /** JSON schema of the tool input object. */
  inputSchema?: Record<string, unknown>;
}
