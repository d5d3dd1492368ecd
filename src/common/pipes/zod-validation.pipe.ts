import type { ArgumentMetadata, PipeTransform } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

export type ValidationIssue = {
  path: string; // dotted, "(root)" for the value itself
  message: string;
};

/** Parses a body or query with a zod schema; the parsed value replaces the raw one. */
@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown, metadata: ArgumentMetadata): T {
    const result = this.schema.safeParse(value);
    if (result.success) return result.data;

    const issues: ValidationIssue[] = result.error.issues.map((i) => ({
      path: i.path.length > 0 ? i.path.join('.') : '(root)',
      message: i.message,
    }));
    throw new InvalidInputError(`Invalid request ${metadata.type}`, {
      source: metadata.type,
      issues,
    });
  }
}
