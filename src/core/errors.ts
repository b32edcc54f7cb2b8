/**
 * Hook failures. Every one of these is fatal for the running hook and is
 * propagated to the snap runtime unchanged.
 */

export class HookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HookError';
  }
}

export class CommandError extends HookError {
  readonly argv: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(argv: string[], exitCode: number | null, stderr: string) {
    const status = exitCode === null ? 'could not be started' : `exited with status ${exitCode}`;
    const detail = stderr.trim();
    super(`Command "${argv.join(' ')}" ${status}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandError';
    this.argv = argv;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class OvsOutputError extends HookError {
  readonly output: string;

  constructor(message: string, output: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OvsOutputError';
    this.output = output;
  }
}

export class TemplateError extends HookError {
  readonly template: string;

  constructor(template: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Template ${template} failed: ${reason}`, { cause });
    this.name = 'TemplateError';
    this.template = template;
  }
}

export class SettingsError extends HookError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SettingsError';
  }
}
