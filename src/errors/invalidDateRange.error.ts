import { GridlabError } from './gridlab.error';

export class InvalidDateRangeError extends GridlabError {
  constructor(label: string, from?: string, to?: string) {
    super('configuration', `Wrong date range for "${label}": ${from} -> ${to}`);
    this.name = 'InvalidDateRangeError';
  }
}
