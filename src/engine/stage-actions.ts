import type { CommandInvocation } from './command-runner';
import { renderManifestList } from './manifests';
import type { EngineSettings } from './settings';
import type { ResolvedImage, Stage } from './types';

type ToolSettings = Pick<EngineSettings, 'dockerBin' | 'kubectlBin'>;

function shell(command: string): CommandInvocation {
  return { label: command, program: command, args: [], shell: true };
}

function tool(program: string, args: string[], input?: string): CommandInvocation {
  const name = program.split('/').pop() ?? program;
  return { label: [name, ...args].join(' '), program, args, input };
}

/**
 * Commands a stage runs, in order. The executor stops at the first non-zero exit,
 * which is what keeps the floating tag untouched when the immutable push fails.
 */
export function planStageCommands(
  stage: Stage,
  image: ResolvedImage,
  tools: ToolSettings,
): CommandInvocation[] {
  switch (stage.kind) {
    case 'build': {
      if (stage.command) return [shell(stage.command)];
      const args = ['build', '-t', image.reference];
      if (stage.dockerfile) args.push('-f', stage.dockerfile);
      args.push(stage.context);
      return [tool(tools.dockerBin, args)];
    }

    case 'push': {
      if (stage.command) return [shell(stage.command)];
      const steps = [tool(tools.dockerBin, ['push', image.reference])];
      if (image.floatingReference !== image.reference) {
        steps.push(
          tool(tools.dockerBin, ['tag', image.reference, image.floatingReference]),
          tool(tools.dockerBin, ['push', image.floatingReference]),
        );
      }
      return steps;
    }

    case 'configure-credentials':
      if (stage.command) return [shell(stage.command)];
      return [tool(tools.kubectlBin, ['cluster-info', '--request-timeout=20s'])];

    case 'deploy':
      // Local clusters get the image by a manual pull-and-apply outside the pipeline.
      if (stage.target === 'local') return [];
      return [
        tool(
          tools.kubectlBin,
          ['apply', '--namespace', stage.workload.namespace, '-f', '-'],
          renderManifestList(stage.workload, stage.service, image),
        ),
      ];

    case 'verify':
      return [shell(stage.command)];
  }
}
