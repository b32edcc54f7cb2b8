import { spawn } from 'child_process';
import { CommandError } from '../core/errors';
import { Logger } from '../logging/logger';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Runs an external program. Substituted with a fake in tests. */
export interface CommandRunner {
  run(argv: string[]): Promise<CommandResult>;
}

export class ProcessCommandRunner implements CommandRunner {
  constructor(private logger?: Logger) {}

  run(argv: string[]): Promise<CommandResult> {
    const [file, ...args] = argv;
    if (!file) {
      return Promise.resolve({ exitCode: null, stdout: '', stderr: 'empty command line' });
    }
    this.logger?.debug(`Running ${argv.join(' ')}`);

    return new Promise(resolve => {
      const child = spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', chunk => {
        stdout += chunk.toString();
      });

      child.stderr.on('data', chunk => {
        stderr += chunk.toString();
      });

      child.on('close', code => {
        resolve({ exitCode: code, stdout, stderr });
      });

      child.on('error', err => {
        resolve({ exitCode: null, stdout, stderr: `${stderr}\n${err.message}`.trim() });
      });
    });
  }
}

export async function checkOutput(runner: CommandRunner, argv: string[]): Promise<string> {
  const result = await runner.run(argv);
  if (result.exitCode !== 0) {
    throw new CommandError(argv, result.exitCode, result.stderr);
  }
  return result.stdout;
}

export async function checkCall(runner: CommandRunner, argv: string[]): Promise<void> {
  await checkOutput(runner, argv);
}
