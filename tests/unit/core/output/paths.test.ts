import { describe, it, expect } from 'vitest';
import { getArtifactPaths } from '../../../../src/core/output/paths.js';

describe('getArtifactPaths', () => {
  it('places artifacts and temporary sources under the theme directory', () => {
    expect(getArtifactPaths('/site/.sonar/css', 'bartik', 'sonar-bartik-abc', 1700000000000)).toEqual({
      directory: '/site/.sonar/css/bartik',
      outputPath: '/site/.sonar/css/bartik/sonar-bartik-abc.css',
      tempPath: '/site/.sonar/css/bartik/tmp.sonar-bartik-abc.1700000000000.scss',
    });
  });

  it('gives concurrent requests distinct temporary sources', () => {
    const first = getArtifactPaths('/out', 'bartik', 'k', 1);
    const second = getArtifactPaths('/out', 'bartik', 'k', 2);

    expect(first.outputPath).toBe(second.outputPath);
    expect(first.tempPath).not.toBe(second.tempPath);
  });
});
