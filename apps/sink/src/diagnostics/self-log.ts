/**
 * Side diagnostic channel.
 *
 * Internal failures of the sink are reported here instead of through the
 * application's logger: a sink that logs its own write failures into itself
 * would recurse. Output defaults to stderr.
 */
export type SelfLogOutput = (line: string) => void;

const defaultOutput: SelfLogOutput = (line) => {
  console.error(line);
};

let output: SelfLogOutput | null = defaultOutput;

export function enableSelfLog(target: SelfLogOutput = defaultOutput): void {
  output = target;
}

export function disableSelfLog(): void {
  output = null;
}

export function selfLog(scope: string, message: string, error?: unknown): void {
  if (!output) return;
  const detail = error === undefined ? '' : `: ${describeError(error)}`;
  // Stack follows on its own lines
  const trace = error instanceof Error && error.stack ? `\n${error.stack}` : '';
  output(`${new Date().toISOString()} [${scope}] ${message}${detail}${trace}`);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
