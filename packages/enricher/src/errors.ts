// packages/enricher/src/errors.ts
export class EnrichError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network, timeout or unusable HTTP exchange. Turned into a status by the client. */
export class TransportError extends EnrichError {}

/** Missing URL column, missing sheet, missing API key. */
export class ConfigurationError extends EnrichError {}

/** Input table missing or unreadable. */
export class InputError extends EnrichError {}

/** Output table could not be written. */
export class OutputError extends EnrichError {}

export const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));
