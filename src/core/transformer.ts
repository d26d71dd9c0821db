import { EtlLogger } from './logger';
import { CleanUserRecord, RawAddress, RawUserRecord, TransformResult, TransformStats } from './types';

export const EMAIL_PATTERN = /^[a-zA-Z0-9_%+-]+(\.[a-zA-Z0-9_%+-]+)*@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const ADDRESS_DELIMITER = ', ';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Narrows a decoded JSON value to a RawUserRecord. Missing or non-string
 * fields become empty strings; returns null when the value is not a mapping
 * or carries no integer id.
 */
export function toRawUser(value: unknown): RawUserRecord | null {
  if (!isPlainObject(value)) return null;

  const id = value.id;
  if (typeof id !== 'number' || !Number.isInteger(id)) return null;

  const address: Record<string, unknown> = isPlainObject(value.address) ? value.address : {};
  const rawAddress: RawAddress = {
    street: asString(address.street),
    suite: asString(address.suite),
    city: asString(address.city),
    zipcode: asString(address.zipcode)
  };

  return {
    id,
    name: asString(value.name),
    email: asString(value.email),
    address: rawAddress
  };
}

export function validateEmail(email: unknown): boolean {
  if (typeof email !== 'string' || !email) return false;
  return EMAIL_PATTERN.test(email.trim());
}

export function normalizeName(name: string): string {
  return name.trim().toUpperCase();
}

export function createFullAddress(address: RawAddress): string {
  return [address.street, address.suite, address.city, address.zipcode]
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .join(ADDRESS_DELIMITER);
}

export class UserTransformer {
  constructor(private logger: EtlLogger) {}

  public transform(records: readonly unknown[]): CleanUserRecord[] {
    return this.transformBatch(records).records;
  }

  public transformBatch(records: readonly unknown[]): TransformResult {
    const stats: TransformStats = {
      input: records.length,
      malformed: 0,
      invalid_email: 0,
      duplicates: 0,
      retained: 0
    };

    if (records.length === 0) {
      this.logger.warn('No users data provided for transformation');
      return { records: [], stats };
    }

    this.logger.info(`Starting transformation of ${records.length} users`);

    const validUsers: RawUserRecord[] = [];
    for (const record of records) {
      const user = toRawUser(record);
      if (!user) {
        stats.malformed++;
        continue;
      }
      if (!validateEmail(user.email)) {
        stats.invalid_email++;
        this.logger.info(`Removing user with invalid email: ${user.email}`, { id: user.id });
        continue;
      }
      validUsers.push(user);
    }

    if (stats.malformed > 0) {
      this.logger.warn(`Skipped ${stats.malformed} malformed records`);
    }
    this.logger.info(`Users with valid emails: ${validUsers.length}`, {
      invalid_email: stats.invalid_email
    });

    const cleaned = validUsers.map(user => this.toCleanUser(user));
    const unique = this.removeDuplicatesById(cleaned, stats);
    stats.retained = unique.length;

    this.logger.info(`Users after removing duplicates: ${unique.length}`, {
      input: stats.input,
      duplicates: stats.duplicates
    });
    return { records: unique, stats };
  }

  private toCleanUser(user: RawUserRecord): CleanUserRecord {
    return {
      id: user.id,
      name: normalizeName(user.name),
      email: user.email.trim(),
      full_address: createFullAddress(user.address)
    };
  }

  private removeDuplicatesById(users: CleanUserRecord[], stats: TransformStats): CleanUserRecord[] {
    const seenIds = new Set<number>();
    const unique: CleanUserRecord[] = [];

    for (const user of users) {
      if (seenIds.has(user.id)) {
        stats.duplicates++;
        this.logger.warn(`Duplicate ID found and removed: ${user.id}`);
        continue;
      }
      seenIds.add(user.id);
      unique.push(user);
    }
    return unique;
  }
}
