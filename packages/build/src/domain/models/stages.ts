import { UnknownStageError } from '../errors.js';

/**
 * Compilation passes of a site build, in the order a full build runs them.
 */
export const BUILD_STAGES = Object.freeze([
  'develop',
  'develop-html',
  'build-javascript',
  'build-html',
] as const);

export type BuildStage = (typeof BUILD_STAGES)[number];

export type BuildMode = 'development' | 'production';

export type BuildTarget = 'web' | 'node';

/**
 * Static facts about a stage that factories and the base configuration branch on.
 */
export interface StageTraits {
  readonly stage: BuildStage;
  readonly mode: BuildMode;
  readonly target: BuildTarget;
  /** Renders pages to HTML in Node rather than bundling browser scripts. */
  readonly html: boolean;
  readonly development: boolean;
  readonly description: string;
}

const STAGE_TRAITS: Readonly<Record<BuildStage, StageTraits>> = Object.freeze({
  develop: Object.freeze({
    stage: 'develop',
    mode: 'development',
    target: 'web',
    html: false,
    development: true,
    description: 'Interactive development bundle served with hot reloading.',
  }),
  'develop-html': Object.freeze({
    stage: 'develop-html',
    mode: 'development',
    target: 'node',
    html: true,
    development: true,
    description: 'Page renderer used to produce HTML while developing.',
  }),
  'build-javascript': Object.freeze({
    stage: 'build-javascript',
    mode: 'production',
    target: 'web',
    html: false,
    development: false,
    description: 'Production browser bundle.',
  }),
  'build-html': Object.freeze({
    stage: 'build-html',
    mode: 'production',
    target: 'node',
    html: true,
    development: false,
    description: 'Production page renderer that writes static HTML.',
  }),
});

export function isBuildStage(value: unknown): value is BuildStage {
  return typeof value === 'string' && BUILD_STAGES.some((stage) => stage === value);
}

/**
 * Narrows user input to a known stage.
 *
 * @param value - Candidate stage name, typically from configuration or the command line.
 * @returns The matching stage.
 * @throws {UnknownStageError} When the value is not one of {@link BUILD_STAGES}.
 */
export function parseBuildStage(value: unknown): BuildStage {
  if (isBuildStage(value)) {
    return value;
  }
  throw new UnknownStageError(value);
}

export function describeStage(stage: BuildStage): StageTraits {
  return STAGE_TRAITS[stage];
}
