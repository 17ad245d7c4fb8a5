import { isAbsolute, relative, resolve, extname, sep } from 'node:path';

/** Project-relative path with forward slashes, used in identity keys and sidecar paths. */
export function toProjectPath(filePath: string, projectRoot: string): string {
  const abs = isAbsolute(filePath) ? filePath : resolve(projectRoot, filePath);
  return relative(projectRoot, abs).split(sep).join('/');
}

/** A project path from `toProjectPath` that leaves the project root. */
export function isOutsideProject(projectPath: string): boolean {
  return projectPath === '..' || projectPath.startsWith('../') || isAbsolute(projectPath);
}

export function getExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}
