export * from './design/index.js';
export * from './allocation/index.js';
export * from './errors/index.js';
export { renderReport } from './report/index.js';
export { loadSurveyConfig, resolveSurvey } from './survey/index.js';
export type { DesignOverrides, ResolvedSurvey } from './survey/index.js';
export { parseSurveyConfig, SurveyConfigSchema } from './schemas/survey.js';
export type { SurveyConfig, StratumConfig } from './schemas/survey.js';
