/**
 * Deployment descriptor rendering: the single substitution point for image references
 */

import { ValidationError } from '@tidewater/shared';

export const IMAGE_PLACEHOLDER = '{{IMAGE}}';

const PLACEHOLDER_PATTERN = /\{\{\s*IMAGE\s*\}\}/g;

// [registry[:port]/]path[:tag][@sha256:digest]
const IMAGE_REF_PATTERN =
  /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?::[0-9]+)?(?:\/[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*)*(?::[A-Za-z0-9_][A-Za-z0-9_.-]{0,127})?(?:@sha256:[a-f0-9]{64})?$/;

export function isValidImageRef(imageRef: string): boolean {
  return IMAGE_REF_PATTERN.test(imageRef);
}

/**
 * Substitute the image reference into a descriptor template.
 * The template must contain the placeholder exactly once.
 */
export function renderDescriptor(template: string, imageRef: string): string {
  if (!isValidImageRef(imageRef)) {
    throw new ValidationError(`Invalid image reference: '${imageRef}'`);
  }

  const occurrences = template.match(PLACEHOLDER_PATTERN)?.length ?? 0;
  if (occurrences !== 1) {
    throw new ValidationError(
      `Descriptor template must contain ${IMAGE_PLACEHOLDER} exactly once, found ${occurrences}`
    );
  }

  return template.replace(PLACEHOLDER_PATTERN, imageRef);
}
