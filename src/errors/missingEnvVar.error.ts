import { GridlabError } from './gridlab.error';

export class MissingEnvVarError extends GridlabError {
  constructor(missingVariable: string) {
    super('configuration', `missing ${missingVariable} environment variable`);
    this.name = 'MissingEnvVarError';
  }
}
