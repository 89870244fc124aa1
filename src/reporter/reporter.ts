import type { MutswitchConfig } from '../config/schema.js';
import type { PipelineResult } from '../mutation/types.js';
import { TextReporter } from './text-reporter.js';
import { JsonReporter } from './json-reporter.js';
import { GithubReporter } from './github-reporter.js';

export type ReportFormat = MutswitchConfig['output'];

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'github'];

export interface Reporter {
  report(result: PipelineResult): string;
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function createReporter(format: ReportFormat): Reporter {
  switch (format) {
    case 'text':
      return new TextReporter();
    case 'json':
      return new JsonReporter();
    case 'github':
      return new GithubReporter();
  }
}
