import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';

export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');

export interface CommandInvocation {
  /** Short human label used in diagnostics, e.g. "docker push acme/web:3f9c2e1". */
  label: string;
  program: string;
  args: string[];
  /** Run `program` through the shell (user-supplied commands). */
  shell?: boolean;
  /** Written to stdin, then stdin is closed. */
  input?: string;
}

export interface CommandOptions {
  env: NodeJS.ProcessEnv;
  onLine: (line: string, stream: 'stdout' | 'stderr') => void;
}

export interface CommandOutcome {
  exitCode: number;
  /** Set when the process could not be started at all. */
  spawnError?: string;
}

/** Runs one external command. Implementations never throw for a non-zero exit. */
export interface CommandRunner {
  run(command: CommandInvocation, options: CommandOptions): Promise<CommandOutcome>;
}

export const SPAWN_FAILURE_EXIT_CODE = 127;

export function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

/**
 * Spawns the command as a child process and reports output line by line.
 * No timeout of its own: docker/kubectl time out themselves and surface as a non-zero exit.
 */
@Injectable()
export class ProcessCommandRunner implements CommandRunner {
  private readonly logger = new Logger(ProcessCommandRunner.name);

  run(command: CommandInvocation, options: CommandOptions): Promise<CommandOutcome> {
    return new Promise<CommandOutcome>((resolve) => {
      const child = command.shell
        ? spawn(command.program, { shell: true, env: options.env })
        : spawn(command.program, command.args, { env: options.env });

      const stdoutBuffer = createLineBuffer((line) => options.onLine(line, 'stdout'));
      const stderrBuffer = createLineBuffer((line) => options.onLine(line, 'stderr'));

      // The stream decoder holds back a multibyte character split across chunks.
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => stdoutBuffer.write(chunk));
      child.stderr?.on('data', (chunk: string) => stderrBuffer.write(chunk));

      if (child.stdin) {
        // EPIPE when the tool exits without reading stdin; the exit code is what counts.
        child.stdin.on('error', (err) =>
          this.logger.debug(`stdin of ${command.label} closed early: ${err.message}`),
        );
        child.stdin.end(command.input ?? '');
      }

      child.on('close', (code) => {
        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
        resolve({ exitCode: code ?? 1 });
      });
      child.on('error', (err) => {
        stdoutBuffer.flush();
        stderrBuffer.flush();
        resolve({ exitCode: SPAWN_FAILURE_EXIT_CODE, spawnError: err.message });
      });
    });
  }
}
