/**
 * Error thrown when an id is registered twice. `register()` itself reports
 * duplicates by returning false; callers that need an error value (the
 * lifecycle manager records one per rejected component) build this.
 */
export class DuplicateRegistrationError extends Error {
  public errPrefix = 'ComponentRegistryErr';
  public errType = 'Registry';
  public errCode = 'DuplicateRegistration';
  public additionalInfo: { id: string };

  constructor(additionalInfo: { id: string }) {
    super(`Component "${additionalInfo.id}" is already registered.`);
    this.name = 'DuplicateRegistrationError';
    this.additionalInfo = additionalInfo;
  }
}

export const componentRegistryErrPrefix = 'ComponentRegistryErr';

export const componentRegistryErrTypes = {
  Registry: 'Registry',
} as const;

export const componentRegistryErrCodes = {
  DuplicateRegistration: 'DuplicateRegistration',
} as const;
