/**
 * Artifact location conventions.
 *
 *   <destination>/<theme>/<key>.css
 *   <destination>/<theme>/tmp.<key>.<requestedAt>.scss
 */
import * as path from 'node:path';

export interface ArtifactPaths {
  /** Theme-scoped directory holding artifacts and temporary sources */
  directory: string;
  outputPath: string;
  tempPath: string;
}

export function getArtifactPaths(
  destinationRoot: string,
  theme: string,
  key: string,
  requestedAt: number
): ArtifactPaths {
  const directory = path.join(destinationRoot, theme);
  return {
    directory,
    outputPath: path.join(directory, `${key}.css`),
    tempPath: path.join(directory, `tmp.${key}.${requestedAt}.scss`),
  };
}
