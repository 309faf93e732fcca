export type IoPointErrorCode =
  | 'SchemaMismatch'
  | 'UnknownModuleType'
  | 'InvalidModuleModel'
  | 'InvalidRequirement'
  | 'EmptyAssignmentSet'
  | 'MissingEngineeringRange'
  | 'MissingColumnValue'
  | 'CapacityExhausted'
  | 'AddressCollision'
  | 'UnknownTemplate'
  | 'TemplateMismatch'
  | 'ConfigError';

export type IoPointErrorDetails = Record<string, string | number | boolean | undefined>;

/**
 * Failure raised by any stage of a point-table run. The `code` names the error kind;
 * `details` carries the offending item, field or module identifier for the caller to surface.
 */
export class IoPointError extends Error {
  constructor(
    public readonly code: IoPointErrorCode,
    message: string,
    public readonly details: IoPointErrorDetails = {}
  ) {
    super(message);
    this.name = 'IoPointError';
  }
}

// Raised while loading configuration; a run cannot start after one of these.
const CONFIGURATION_CODES: ReadonlySet<IoPointErrorCode> = new Set<IoPointErrorCode>([
  'InvalidModuleModel',
  'ConfigError',
  'UnknownTemplate'
]);

export function isIoPointError(error: unknown): error is IoPointError {
  return error instanceof IoPointError;
}

export function isConfigurationError(error: IoPointError): boolean {
  return CONFIGURATION_CODES.has(error.code);
}

export function schemaMismatch(fieldId: string, message: string, details: IoPointErrorDetails = {}): IoPointError {
  return new IoPointError('SchemaMismatch', message, { field: fieldId, ...details });
}

export function invalidModuleModel(moduleType: string, message: string): IoPointError {
  return new IoPointError('InvalidModuleModel', message, { moduleType });
}

export function emptyAssignmentSet(templateId: string, classes: readonly string[]): IoPointError {
  return new IoPointError(
    'EmptyAssignmentSet',
    `No ${classes.join('/')} assignments to generate template ${templateId}.`,
    { template: templateId, signalClasses: classes.join(',') }
  );
}
