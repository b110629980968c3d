import { MalformedConfigurationError } from '@errors/malformedConfiguration.error';
import { MissingEnvVarError } from '@errors/missingEnvVar.error';
import { Configuration as ConfigurationModel } from '@models/configuration.types';
import { Period } from '@models/period.types';
import { listThresholdsOutOfRecommendedRange } from '@services/core/backtest/gridBacktest.utils';
import { resolvePeriods } from '@services/core/period/period';
import { info, warning } from '@services/logger';
import { searchSymbol } from '@services/symbolDirectory/symbolDirectory';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import JSON5 from 'json5';
import { z } from 'zod';
import { CONFIG_FILE_PATH_ENV } from './configuration.const';
import { configurationSchema } from './configuration.schema';

const parseFile = (configFilePath: string): unknown => {
  const isJson = configFilePath.endsWith('json') || configFilePath.endsWith('json5');
  const isYaml = configFilePath.endsWith('yml') || configFilePath.endsWith('yaml');
  if (!isJson && !isYaml) throw new MalformedConfigurationError(`unsupported file type ${configFilePath}`);

  const data = readFileSync(configFilePath, 'utf8');
  return isJson ? JSON5.parse(data) : load(data);
};

class Configuration {
  private readonly configuration: ConfigurationModel;

  constructor() {
    const configFilePath = process.env[CONFIG_FILE_PATH_ENV];
    if (!configFilePath) throw new MissingEnvVarError(CONFIG_FILE_PATH_ENV);

    const parsed = configurationSchema.safeParse(parseFile(configFilePath));
    if (!parsed.success) throw new MalformedConfigurationError(z.prettifyError(parsed.error));
    this.configuration = parsed.data;
  }

  /** Symbol to backtest, resolved through the symbol directory when a search is configured. */
  public getSymbol() {
    const { search, symbol } = this.configuration;
    if (!search) return symbol;

    const match = searchSymbol(search);
    if (!match) {
      warning('configuration', `No directory entry matches "${search}", using ${symbol}`);
      return symbol;
    }
    info('configuration', `"${search}" resolved to ${match.name} (${match.symbol})`);
    return match.symbol;
  }

  public getPeriods(now: EpochTimeStamp = Date.now()): Period[] {
    const { view, periods } = this.configuration;
    return resolvePeriods(view, now, periods);
  }

  public getStrategy() {
    const { strategy } = this.configuration;
    const outOfRange = listThresholdsOutOfRecommendedRange(strategy);
    if (outOfRange.length)
      warning('configuration', `${outOfRange.join(', ')} outside the recommended 0.1% - 5% range`);
    return strategy;
  }

  public getCache() {
    return this.configuration.cache;
  }

  public getReport() {
    return this.configuration.report;
  }
}

export const config = new Configuration();
