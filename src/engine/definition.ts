import { z, ZodError } from 'zod';
import { ConfigurationError } from './errors';
import type { CredentialScope, PipelineDefinition, Stage } from './types';

const stageName = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'Stage names use letters, digits, ".", "_" and "-"');

const base = {
  name: stageName,
  dependsOn: z.array(stageName).max(50).default([]),
};

const workloadSchema = z.object({
  name: z.string().min(1).max(253),
  namespace: z.string().min(1).max(63).default('default'),
  replicas: z.number().int().min(0),
  image: z.string().min(1).optional(),
  containerPort: z.number().int().min(1).max(65535),
  labels: z.record(z.string()).default({}),
});

const serviceSchema = z.object({
  name: z.string().min(1).max(253),
  selector: z.record(z.string()),
  port: z.number().int().min(1).max(65535),
  targetPort: z.number().int().min(1).max(65535),
  type: z.enum(['ClusterIP', 'NodePort', 'LoadBalancer']).default('ClusterIP'),
});

const stageSchema = z.discriminatedUnion('kind', [
  z.object({
    ...base,
    kind: z.literal('build'),
    context: z.string().min(1).default('.'),
    dockerfile: z.string().min(1).optional(),
    command: z.string().min(1).optional(),
  }),
  z.object({ ...base, kind: z.literal('push'), command: z.string().min(1).optional() }),
  z.object({
    ...base,
    kind: z.literal('configure-credentials'),
    command: z.string().min(1).optional(),
  }),
  z.object({
    ...base,
    kind: z.literal('deploy'),
    target: z.enum(['remote', 'local']).default('remote'),
    workload: workloadSchema,
    service: serviceSchema.optional(),
    rolloutTimeoutMs: z.number().int().positive().optional(),
  }),
  z.object({ ...base, kind: z.literal('verify'), command: z.string().min(1) }),
]);

export const pipelineDefinitionSchema = z.object({
  name: z.string().min(1).max(255),
  image: z.object({
    registryUser: z.string().min(1),
    name: z.string().min(1),
    floatingTag: z.string().min(1).default('latest'),
  }),
  stages: z.array(stageSchema).min(1).max(50),
});

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse a stored/posted definition. The result is deep-frozen and its
 * dependency graph has already been checked.
 */
export function parsePipelineDefinition(raw: unknown): PipelineDefinition {
  const parsed = pipelineDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pipeline definition: ${describeZodError(parsed.error)}`);
  }
  const definition: PipelineDefinition = parsed.data;
  resolveStageOrder(definition);
  return deepFreeze(definition);
}

/**
 * Execution order of the stages. Dependencies may only name stages defined earlier,
 * so definition order is already a valid order and no cycle can form.
 * Throws ConfigurationError on duplicate names and on self, unknown or later references.
 */
export function resolveStageOrder(definition: PipelineDefinition): Stage[] {
  const { stages } = definition;
  const position = new Map<string, number>();

  stages.forEach((stage, index) => {
    if (position.has(stage.name)) {
      throw new ConfigurationError(`Duplicate stage name "${stage.name}"`);
    }
    position.set(stage.name, index);
  });

  stages.forEach((stage, index) => {
    for (const dep of stage.dependsOn) {
      if (dep === stage.name) {
        throw new ConfigurationError(`Stage "${stage.name}" depends on itself`);
      }
      const at = position.get(dep);
      if (at === undefined) {
        throw new ConfigurationError(`Stage "${stage.name}" depends on unknown stage "${dep}"`);
      }
      if (at > index) {
        throw new ConfigurationError(
          `Stage "${stage.name}" depends on "${dep}", which is defined after it`,
        );
      }
    }
  });

  return [...stages];
}

/** Secret scope a stage needs while it runs, or null. */
export function credentialScopeFor(stage: Stage): CredentialScope | null {
  switch (stage.kind) {
    case 'push':
      return 'registry-write';
    case 'configure-credentials':
      return 'cluster-admin';
    case 'deploy':
      return stage.target === 'remote' ? 'cluster-admin' : null;
    case 'build':
    case 'verify':
      return null;
  }
}

export function requiredCredentialScopes(definition: PipelineDefinition): CredentialScope[] {
  const scopes = new Set<CredentialScope>();
  for (const stage of definition.stages) {
    const scope = credentialScopeFor(stage);
    if (scope) scopes.add(scope);
  }
  return [...scopes];
}

/**
 * Deploy target keys ("namespace/workload") used to serialize runs touching the same
 * workloads. Sorted, so every worker takes several locks in the same order.
 */
export function deploymentTargetsOf(definition: PipelineDefinition): string[] {
  const targets = new Set<string>();
  for (const stage of definition.stages) {
    if (stage.kind === 'deploy') {
      targets.add(`${stage.workload.namespace}/${stage.workload.name}`);
    }
  }
  return [...targets].sort();
}
