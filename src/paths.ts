import path from 'node:path';
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Maximum number of characters preserved in a sanitised filename. */
const MAX_FILENAME_LENGTH = 120;

/**
 * Raised when a path computed from catalogue input (dataset identifiers, raw
 * file names, FASTA names) would land outside the directory it belongs to.
 */
export class PathResolutionError extends Error {
  public readonly code = 'E-PATHS-ESCAPE';
  /** Absolute path that the caller attempted to access. */
  public readonly attemptedPath: string;
  /** Base directory configured for the operation. */
  public readonly rootDirectory: string;

  constructor(message: string, attemptedPath: string, rootDirectory: string) {
    super(message);
    this.name = 'PathResolutionError';
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError('path escapes base directory', targetPath, absoluteRoot);
  }

  return targetPath;
}

/**
 * Sanitises a filename so it can safely be persisted on disk. Path separators,
 * control characters and whitespace are replaced; an empty result falls back
 * to a neutral placeholder.
 */
export function sanitizeFilename(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return 'unnamed';
  }

  const basicSanitised = trimmed
    .normalize('NFC')
    .replace(/[\0-\x1F\x7F]/g, '')
    .replace(/\.\./g, '')
    .replace(/[\\/]/g, '_')
    .replace(/[:*?"<>|]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}._-]+/gu, '_');

  const collapsed = basicSanitised.replace(/_+/g, '_').replace(/^_+|_+$/g, '');
  const limited = collapsed.length > MAX_FILENAME_LENGTH ? collapsed.slice(0, MAX_FILENAME_LENGTH) : collapsed;

  return limited.length > 0 ? limited : 'unnamed';
}

/** Workspace owned by one dataset: `<dataRoot>/<partition>/<datasetId>`. */
export function datasetWorkspacePath(dataRoot: string, partition: string, datasetId: string): string {
  return resolveWithin(dataRoot, sanitizeFilename(partition), sanitizeFilename(datasetId));
}
