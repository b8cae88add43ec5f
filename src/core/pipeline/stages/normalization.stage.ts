import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { IntakeFate } from '../../domain/enums';
import { SquareWebhookPayload } from '../../domain/models';
import {
  IntakeContext,
  PayloadParseError,
  PipelineStage,
  StageResult,
} from '../types';

/**
 * Intake stage 1: Normalization
 * Parses the raw body and checks it has the shape of a webhook notification
 */
export class NormalizationStage implements PipelineStage<IntakeContext> {
  name = 'normalization';

  async execute(context: IntakeContext): Promise<StageResult<IntakeContext>> {
    const startTime = Date.now();

    try {
      context.payload = this.parse(context.rawBody);

      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: {
          eventType: context.payload.type,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      context.fate = IntakeFate.PARSE_ERROR;
      context.error = error instanceof Error ? error : new Error(String(error));
      context.reason = context.error.message;

      return {
        success: false,
        context,
        error: context.error,
        shouldContinue: false,
        metadata: {
          durationMs: Date.now() - startTime,
        },
      };
    }
  }

  private parse(rawBody: Buffer): SquareWebhookPayload {
    if (rawBody.length === 0) {
      throw new PayloadParseError('Empty request body');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      throw new PayloadParseError(
        `Body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new PayloadParseError('Body is not a JSON object');
    }

    const payload = plainToInstance(SquareWebhookPayload, parsed);
    const errors = validateSync(payload);
    if (errors.length > 0) {
      const violations = this.flatten(errors);
      throw new PayloadParseError(
        `Payload failed validation: ${violations.join('; ')}`,
        violations,
      );
    }

    return payload;
  }

  private flatten(errors: ValidationError[], parent?: string): string[] {
    return errors.flatMap((error) => {
      const path = parent ? `${parent}.${error.property}` : error.property;
      const own = Object.values(error.constraints ?? {}).map(
        (message) => `${path}: ${message}`,
      );
      return [...own, ...this.flatten(error.children ?? [], path)];
    });
  }
}
