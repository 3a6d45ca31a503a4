export type ToolErrorCode =
  | 'TOOL_MISSING'
  | 'TOOL_TIMEOUT'
  | 'TOOL_FAILED'
  | 'TOOL_INVALID_OUTPUT';

export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly tool: string;
  readonly operatorHint: string;

  constructor(opts: {
    code: ToolErrorCode;
    tool: string;
    message: string;
    operatorHint: string;
    cause?: unknown;
  }) {
    super(opts.message);
    this.name = 'ToolError';
    this.code = opts.code;
    this.tool = opts.tool;
    this.operatorHint = opts.operatorHint;
    if (opts.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

export function isToolError(value: unknown): value is ToolError {
  return value instanceof ToolError;
}

export function isToolTimeout(value: unknown): boolean {
  return isToolError(value) && value.code === 'TOOL_TIMEOUT';
}
