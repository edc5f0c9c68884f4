import type {
  CommandInvocation,
  CommandOptions,
  CommandOutcome,
  CommandRunner,
} from '../command-runner';

interface ScriptedResponse {
  matches: (command: CommandInvocation) => boolean;
  exitCode: number;
  lines: string[];
}

export interface RecordedCommand {
  command: CommandInvocation;
  env: NodeJS.ProcessEnv;
}

/** In-process stand-in for docker/kubectl. Unscripted commands exit 0 silently. */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly responses: ScriptedResponse[] = [];

  /** First matching script wins; `label` matches by prefix. */
  respond(label: string | ((command: CommandInvocation) => boolean), exitCode: number, lines: string[] = []) {
    const matches =
      typeof label === 'string' ? (c: CommandInvocation) => c.label.startsWith(label) : label;
    this.responses.push({ matches, exitCode, lines });
    return this;
  }

  labels(): string[] {
    return this.calls.map((call) => call.command.label);
  }

  async run(command: CommandInvocation, options: CommandOptions): Promise<CommandOutcome> {
    this.calls.push({ command, env: options.env });
    const scripted = this.responses.find((r) => r.matches(command));
    for (const line of scripted?.lines ?? []) options.onLine(line, 'stdout');
    return { exitCode: scripted?.exitCode ?? 0 };
  }
}
