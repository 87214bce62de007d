import { describe, expect, it } from 'vitest';

import { UnknownStageError } from '../errors.js';
import { BUILD_STAGES, describeStage, isBuildStage, parseBuildStage } from './stages.js';

describe('build stages', () => {
  it('lists the four stages in build order', () => {
    expect(BUILD_STAGES).toEqual(['develop', 'develop-html', 'build-javascript', 'build-html']);
    expect(Object.isFrozen(BUILD_STAGES)).toBe(true);
  });

  it('recognises only known stage names', () => {
    expect(isBuildStage('develop-html')).toBe(true);
    expect(isBuildStage('production')).toBe(false);
    expect(isBuildStage(42)).toBe(false);
  });

  it('parses known stages and rejects anything else', () => {
    expect(parseBuildStage('build-html')).toBe('build-html');
    expect(() => parseBuildStage('build-css')).toThrow(UnknownStageError);
    expect(() => parseBuildStage('build-css')).toThrow(
      'Unknown build stage "build-css". Expected one of: develop, develop-html, build-javascript, build-html.',
    );
  });

  it('describes the mode and target of each stage', () => {
    expect(
      BUILD_STAGES.map((stage) => {
        const traits = describeStage(stage);
        return [traits.stage, traits.mode, traits.target, traits.html];
      }),
    ).toEqual([
      ['develop', 'development', 'web', false],
      ['develop-html', 'development', 'node', true],
      ['build-javascript', 'production', 'web', false],
      ['build-html', 'production', 'node', true],
    ]);
  });
});
