import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { MessageCandidate } from '../domain/models';
import { FieldError } from '../interfaces';
import { InboundMessagePayload } from './inbound-message.payload';

/**
 * Parse a validated `...Z` timestamp. Fractions beyond milliseconds
 * are truncated.
 */
export function parseUtcTimestamp(value: string): Date {
  return new Date(
    value.replace(
      /\.(\d+)Z$/,
      (_match, fraction: string) => `.${fraction.padEnd(3, '0').slice(0, 3)}Z`,
    ),
  );
}

export type ValidationOutcome =
  | { valid: true; candidate: MessageCandidate }
  | { valid: false; errors: FieldError[] };

/**
 * Transport-independent payload validation.
 * Collects every violated rule instead of stopping at the first.
 */
export class MessageValidator {
  /**
   * Decode a UTF-8 JSON body and validate it
   */
  parse(rawBody: Buffer): ValidationOutcome {
    let decoded: unknown;
    try {
      decoded = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      return this.invalidBody(
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    return this.validate(decoded);
  }

  validate(decoded: unknown): ValidationOutcome {
    if (!this.isJsonObject(decoded)) {
      return this.invalidBody('body must be a JSON object');
    }

    const payload = plainToInstance(InboundMessagePayload, decoded);
    const violations = validateSync(payload);

    if (violations.length > 0) {
      return { valid: false, errors: this.flatten(violations) };
    }

    return {
      valid: true,
      candidate: {
        messageId: payload.message_id,
        fromAddress: payload.from,
        toAddress: payload.to,
        timestamp: parseUtcTimestamp(payload.ts),
        text: payload.text ?? null,
      },
    };
  }

  private flatten(violations: ValidationError[]): FieldError[] {
    const errors: FieldError[] = [];
    for (const violation of violations) {
      for (const message of Object.values(violation.constraints ?? {})) {
        errors.push({ location: violation.property, message });
      }
    }
    return errors;
  }

  private isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private invalidBody(message: string): ValidationOutcome {
    return { valid: false, errors: [{ location: 'body', message }] };
  }
}
