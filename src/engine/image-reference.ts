import { ConfigurationError } from './errors';
import type { ImageSpec, ResolvedImage } from './types';

const CONTENT_TAG = /^[0-9a-f]{7,40}$/;
const NAME_SEGMENT = /^[a-z0-9]+(?:[._-][a-z0-9]+)*$/;
const REFERENCE = /^([^/:\s]+)\/([^/:\s]+):([A-Za-z0-9_][A-Za-z0-9_.-]{0,127})$/;

export interface ParsedImageReference {
  registryUser: string;
  name: string;
  tag: string;
}

export function isContentAddressedTag(tag: string): boolean {
  return CONTENT_TAG.test(tag);
}

/** Parse `registry-username/image-name:tag`. Returns null when it does not match. */
export function parseImageReference(reference: string): ParsedImageReference | null {
  const match = REFERENCE.exec(reference.trim());
  if (!match) return null;
  const [, registryUser, name, tag] = match;
  if (!NAME_SEGMENT.test(registryUser) || !NAME_SEGMENT.test(name)) return null;
  return { registryUser, name, tag };
}

/**
 * Resolve the image a run pushes and deploys.
 * `tag` is a commit hash (immutable) or the floating tag itself.
 */
export function resolveImage(spec: ImageSpec, tag: string): ResolvedImage {
  if (!NAME_SEGMENT.test(spec.registryUser) || !NAME_SEGMENT.test(spec.name)) {
    throw new ConfigurationError(`Invalid image name ${spec.registryUser}/${spec.name}`);
  }
  const normalized = tag.trim().toLowerCase();
  if (normalized !== spec.floatingTag && !isContentAddressedTag(normalized)) {
    throw new ConfigurationError(
      `Image tag "${tag}" must be a commit hash (7-40 hex chars) or "${spec.floatingTag}"`,
    );
  }

  const repository = `${spec.registryUser}/${spec.name}`;
  return {
    repository,
    tag: normalized,
    floatingTag: spec.floatingTag,
    reference: `${repository}:${normalized}`,
    floatingReference: `${repository}:${spec.floatingTag}`,
  };
}
