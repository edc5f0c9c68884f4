import { ConfigurationError } from './errors';
import type { ResolvedImage, ServiceSpec, WorkloadSpec } from './types';

/**
 * Image the workload runs. A manifest may omit it (the immutable reference is used)
 * or name the run's immutable or floating reference; anything else is rejected.
 */
export function workloadImage(workload: WorkloadSpec, image: ResolvedImage): string {
  if (workload.image === undefined) return image.reference;
  if (workload.image === image.reference || workload.image === image.floatingReference) {
    return workload.image;
  }
  throw new ConfigurationError(
    `Workload "${workload.name}" image ${workload.image} does not match ${image.reference}`,
  );
}

function podLabels(workload: WorkloadSpec): Record<string, string> {
  return { app: workload.name, ...workload.labels };
}

export function renderDeployment(workload: WorkloadSpec, image: ResolvedImage) {
  const labels = podLabels(workload);
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: workload.name, namespace: workload.namespace, labels },
    spec: {
      replicas: workload.replicas,
      selector: { matchLabels: labels },
      template: {
        metadata: { labels },
        spec: {
          containers: [
            {
              name: workload.name,
              image: workloadImage(workload, image),
              ports: [{ containerPort: workload.containerPort }],
            },
          ],
        },
      },
    },
  };
}

export function renderService(service: ServiceSpec, namespace: string) {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: service.name, namespace },
    spec: {
      type: service.type,
      selector: service.selector,
      ports: [{ port: service.port, targetPort: service.targetPort }],
    },
  };
}

/** Deployment (and Service) as one `kubectl apply -f -` document. */
export function renderManifestList(
  workload: WorkloadSpec,
  service: ServiceSpec | undefined,
  image: ResolvedImage,
): string {
  const items: object[] = [renderDeployment(workload, image)];
  if (service) items.push(renderService(service, workload.namespace));
  return JSON.stringify({ apiVersion: 'v1', kind: 'List', items }, null, 2);
}
