export const DEFAULT_IMAGE_EXT = 'jpg';

/**
 * Text after the last "." of the client's filename, or "jpg" when there is none.
 * Pure string splitting: the bytes are never inspected.
 */
export function extensionFromFilename(originalName: string | null | undefined): string {
  const name = originalName ?? '';
  const dot = name.lastIndexOf('.');
  if (dot === -1) return DEFAULT_IMAGE_EXT;
  return name.slice(dot + 1);
}

export function storedImageFilename(postId: string, originalName: string | null | undefined): string {
  return `${postId}.${extensionFromFilename(originalName)}`;
}

export function isImageContentType(contentType: string | null | undefined): boolean {
  return (contentType ?? '').startsWith('image/');
}
