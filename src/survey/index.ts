export { loadSurveyConfig, resolveSurvey, DEFAULT_SURVEY_FILE } from './loader.js';
export type { DesignOverrides, ResolvedSurvey } from './loader.js';
export { EXAMPLE_SURVEY } from './example.js';
