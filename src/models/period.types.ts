export type ViewMode = 'bull-markets' | 'full-history' | 'custom';

export interface PeriodDefinition {
  label: string;
  /** yyyy-MM-dd */
  start: string;
  /** yyyy-MM-dd, today when omitted */
  end?: string;
}

export interface Period {
  label: string;
  start: EpochTimeStamp;
  end: EpochTimeStamp;
}
