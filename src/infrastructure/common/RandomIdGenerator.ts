import { randomUUID } from 'crypto';
import { IIdGenerator } from '../../domain/common/IIdGenerator';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/**
 * ID generator backed by random v4 UUIDs.
 * Generates IDs in the format: {prefix}_{uuid}
 */
export class RandomIdGenerator implements IIdGenerator {
  generate(prefix: string): string {
    return `${prefix}_${randomUUID()}`;
  }

  validate(id: string): boolean {
    const separator = id.indexOf('_');
    if (separator <= 0) return false;
    return UUID_PATTERN.test(id.slice(separator + 1));
  }
}
