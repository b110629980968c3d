import { GridlabError } from './gridlab.error';

export class MalformedConfigurationError extends GridlabError {
  constructor(message: string) {
    super('configuration', `Malformed configuration file: ${message}`);
    this.name = 'MalformedConfigurationError';
  }
}
