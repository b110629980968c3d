import { PeriodDefinition, ViewMode } from '@models/period.types';

export const PERIOD_PRESETS: Record<Exclude<ViewMode, 'custom'>, readonly PeriodDefinition[]> = {
  'bull-markets': [
    { label: '2016-2017 blue-chip bull', start: '2016-01-01', end: '2017-12-31' },
    { label: '2019-2021 growth bull', start: '2019-01-01', end: '2021-02-10' },
    { label: '2024-present policy bull', start: '2024-09-24' },
  ],
  'full-history': [{ label: '2015-present full history', start: '2015-01-01' }],
};
