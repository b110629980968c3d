import { ReportConfig } from '@models/configuration.types';
import { CompletedPeriod, PeriodOutcome } from '@services/core/pipeline/pipeline.types';
import { error, info } from '@services/logger';
import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import path from 'path';
import { EQUITY_CURVE_CSV_HEADER, SUMMARY_CSV_HEADER } from './reporter.const';
import { buildSummaryRows, getEquityCurveFileName, toEquityCurveCsvLines, toSummaryCsvLine } from './reporter.utils';

export class Reporter {
  private readonly config: ReportConfig;
  private readonly symbol: string;

  constructor(config: ReportConfig, symbol: string) {
    this.config = config;
    this.symbol = symbol;
  }

  public publish(outcomes: readonly PeriodOutcome[]) {
    const completed = outcomes.filter((outcome): outcome is CompletedPeriod => outcome.status === 'completed');
    const rows = buildSummaryRows(completed);

    if (this.config.consoleTable) {
      // eslint-disable-next-line no-console
      console.table(rows);
      outcomes.forEach(outcome => {
        if (outcome.status !== 'skipped') return;
        // eslint-disable-next-line no-console
        console.log(`Skipped "${outcome.period.label}": ${outcome.reason}`);
      });
    }
    info('reporter', rows);

    const { csv } = this.config;
    if (!csv) return rows;

    try {
      mkdirSync(csv.filePath, { recursive: true });

      const summaryPath = path.join(csv.filePath, csv.fileName);
      const needsHeader = !existsSync(summaryPath) || statSync(summaryPath).size === 0;
      if (needsHeader) writeFileSync(summaryPath, SUMMARY_CSV_HEADER, 'utf8');
      appendFileSync(summaryPath, rows.map(row => toSummaryCsvLine(this.symbol, row)).join(''), 'utf8');

      if (csv.equityCurves) {
        for (const { period, outcome } of completed) {
          const curvePath = path.join(csv.filePath, getEquityCurveFileName(this.symbol, period.label));
          writeFileSync(curvePath, EQUITY_CURVE_CSV_HEADER + toEquityCurveCsvLines(outcome.steps), 'utf8');
        }
      }
    } catch (err) {
      error('reporter', `write error: ${err instanceof Error ? err.message : err}`);
      throw err;
    }

    return rows;
  }
}
