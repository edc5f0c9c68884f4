import { Inject, Injectable, Logger } from '@nestjs/common';
import { COMMAND_RUNNER, CommandRunner } from './command-runner';
import { ExecutionError } from './errors';
import { createRedactor } from './redaction';
import { ENGINE_SETTINGS, EngineSettings } from './settings';
import { planStageCommands } from './stage-actions';
import type { RunContext, Stage, StageResult } from './types';

/**
 * Runs one stage: plans its commands, runs them in order, captures redacted output.
 * It does not interpret what the commands do beyond their exit codes, and never retries.
 */
@Injectable()
export class StageExecutor {
  private readonly logger = new Logger(StageExecutor.name);

  constructor(
    @Inject(COMMAND_RUNNER) private readonly runner: CommandRunner,
    @Inject(ENGINE_SETTINGS) private readonly settings: EngineSettings,
  ) {}

  async execute(stage: Stage, context: RunContext): Promise<StageResult> {
    const startedAt = new Date();
    const redact = createRedactor(context.secrets.knownValues());
    const lines: string[] = [];
    const record = (line: string, stream: 'stdout' | 'stderr') => {
      const safe = redact(line);
      lines.push(safe);
      context.onOutput?.(stage.name, safe, stream);
    };

    const env: NodeJS.ProcessEnv = { ...process.env, ...(context.credential?.env ?? {}) };
    const commands = planStageCommands(stage, context.image, this.settings);

    if (commands.length === 0) {
      record(`${stage.kind} stage "${stage.name}" has nothing to run for this target`, 'stdout');
    }

    for (const command of commands) {
      record(`$ ${command.label}`, 'stdout');
      const outcome = await this.runner.run(command, { env, onLine: record });
      if (outcome.spawnError) {
        record(`Execution error: ${outcome.spawnError}`, 'stderr');
      }
      if (outcome.exitCode !== 0) {
        const message = redact(`${command.label} exited with code ${outcome.exitCode}`);
        this.logger.warn(`Stage ${stage.name} failed: ${message}`);
        const failed: StageResult = {
          stage: stage.name,
          kind: stage.kind,
          status: 'failed',
          startedAt,
          completedAt: new Date(),
          output: lines.join('\n'),
          exitCode: outcome.exitCode,
          error: new ExecutionError(message, outcome.exitCode),
        };
        return Object.freeze(failed);
      }
    }

    const succeeded: StageResult = {
      stage: stage.name,
      kind: stage.kind,
      status: 'succeeded',
      startedAt,
      completedAt: new Date(),
      output: lines.join('\n'),
      exitCode: 0,
    };
    return Object.freeze(succeeded);
  }
}
