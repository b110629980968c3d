import { ViewMode } from '@models/period.types';

export const VIEW_MODES = ['bull-markets', 'full-history', 'custom'] as const satisfies readonly ViewMode[];

export const CONFIG_FILE_PATH_ENV = 'GRIDLAB_CONFIG_FILE_PATH';

export const DEFAULT_REPORT_FILE_NAME = 'gridlab-report.csv';
