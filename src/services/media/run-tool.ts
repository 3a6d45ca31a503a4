import path from 'node:path';
import { execa, ExecaError } from 'execa';
import { ToolError } from '@/services/media/errors';

export interface ToolRunOptions {
  timeoutMs?: number;
}

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

export type ToolRunner = (
  command: string,
  args: string[],
  options?: ToolRunOptions
) => Promise<ToolOutput>;

function lastLine(text: unknown): string {
  if (typeof text !== 'string') {
    return '';
  }
  const lines = text.trim().split('\n');
  return (lines[lines.length - 1] ?? '').trim();
}

/** Runs an external tool and maps every failure onto a ToolError. */
export const runTool: ToolRunner = async (command, args, options = {}) => {
  const tool = path.basename(command);
  try {
    const result = await execa(command, args, {
      timeout: options.timeoutMs,
      stdin: 'ignore'
    });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (error) {
    if (error instanceof ExecaError) {
      if (error.code === 'ENOENT') {
        throw new ToolError({
          code: 'TOOL_MISSING',
          tool,
          message: `${tool} was not found`,
          operatorHint: `Install ${tool} or point its *_PATH variable at the binary.`,
          cause: error
        });
      }
      if (error.timedOut) {
        throw new ToolError({
          code: 'TOOL_TIMEOUT',
          tool,
          message: `${tool} did not finish within ${options.timeoutMs ?? 0} ms`,
          operatorHint: 'Raise OPERATION_TIMEOUT_SECONDS for very long files.',
          cause: error
        });
      }
      throw new ToolError({
        code: 'TOOL_FAILED',
        tool,
        message: `${tool} failed: ${lastLine(error.stderr) || error.shortMessage}`,
        operatorHint: `Run ${tool} manually with the same arguments to inspect the failure.`,
        cause: error
      });
    }
    throw error;
  }
};

/** Startup check; a missing required tool stops the run. */
export async function assertToolsAvailable(
  tools: Array<{ command: string; versionArgs: string[] }>,
  runner: ToolRunner = runTool
): Promise<void> {
  for (const { command, versionArgs } of tools) {
    await runner(command, versionArgs, { timeoutMs: 10_000 });
  }
}
