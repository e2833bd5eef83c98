// Errores del registro de historias y de los ledgers subyacentes

export const STORY_ERROR_CODES = {
  Unauthorized: 403,
  InvalidStory: 400,
  StoryNotFound: 404,
  InsufficientFunds: 402,
} as const;

export type StoryErrorName = keyof typeof STORY_ERROR_CODES;
export type StoryErrorCode = (typeof STORY_ERROR_CODES)[StoryErrorName];

/**
 * Error propio del registro. El código numérico se devuelve tal cual al cliente.
 */
export class StoryRegistryError extends Error {
  readonly code: StoryErrorCode;

  constructor(readonly errorName: StoryErrorName, message: string) {
    super(message);
    this.name = 'StoryRegistryError';
    this.code = STORY_ERROR_CODES[errorName];
  }
}

export type LedgerErrorCode =
  | 'token-exists'
  | 'token-not-found'
  | 'not-owner'
  | 'sender-is-recipient'
  | 'non-positive-amount'
  | 'insufficient-balance';

/**
 * Fallo reportado por el ledger de propiedad o de fondos.
 * El registro no lo reclasifica: se propaga tal cual.
 */
export class LedgerError extends Error {
  constructor(readonly code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}
