import { createHash } from 'node:crypto';

const ID_LENGTH = 16;

function digest(text: string): string {
  return createHash('sha3-224').update(text, 'utf8').digest('hex').slice(0, ID_LENGTH);
}

/**
 * Derives stable cell ids from cell sources. The same source always maps to
 * the same id unless that id is already taken, in which case the cell index
 * is mixed in until a free id turns up.
 */
export class CellIdGenerator {
  private readonly taken: Set<string>;

  constructor(existing: Iterable<string> = []) {
    this.taken = new Set(existing);
  }

  next(source: string, index: number): string {
    let id = digest(source);
    let salt = index;
    while (this.taken.has(id)) {
      id = digest(`${salt}:${source}`);
      salt++;
    }
    this.taken.add(id);
    return id;
  }

  has(id: string): boolean {
    return this.taken.has(id);
  }
}
