/**
 * Types for the container build backend
 */

import type { RegistryCredentials } from '@tidewater/shared';

export interface ImageBuildRequest {
  serviceId: string;
  /** Absolute build context directory */
  contextDir: string;
  /** Dockerfile path, relative to the context directory */
  dockerfile: string;
  imageRepository: string;
  /** Content digest of the build inputs; names the local image */
  contentDigest: string;
  buildArgs?: Record<string, string>;
  labels?: Record<string, string>;
  timeoutMs?: number;
}

export interface ImageBuildResult {
  success: boolean;
  /** Content-addressed local reference, `<repository>:build-<digest>` */
  imageRef?: string;
  imageId?: string;
  error?: string;
  logs: string[];
  durationMs: number;
}

export interface ImagePushResult {
  /** Every reference now present in the registry */
  publishedRefs: string[];
  /** Registry manifest digest, when reported */
  digest?: string;
  logs: string[];
}

/**
 * Produces images from a build context and publishes them to a registry.
 *
 * build() reports build failures in its result; push() throws
 * TransientInfraError or RegistryError so callers can retry transient faults.
 */
export interface ContainerBuildBackend {
  build(request: ImageBuildRequest): Promise<ImageBuildResult>;
  /** Whether a locally built image is still present */
  hasImage(imageRef: string): Promise<boolean>;
  push(imageRef: string, targetRefs: string[], credentials?: RegistryCredentials): Promise<ImagePushResult>;
}

export interface ImageBuilderConfig {
  /** Container CLI binary */
  binary: string;
  buildTimeoutMs: number;
  pushTimeoutMs: number;
  /** Characters of the content digest used in the local tag */
  digestTagLength: number;
  labels: Record<string, string>;
}

export const DEFAULT_IMAGE_BUILDER_CONFIG: ImageBuilderConfig = {
  binary: 'docker',
  buildTimeoutMs: 600000, // 10 minutes
  pushTimeoutMs: 180000, // 3 minutes
  digestTagLength: 12,
  labels: {},
};
