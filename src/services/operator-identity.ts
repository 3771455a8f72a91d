/**
 * Who may run operator actions (status changes, catalog and settings edits).
 * Injected into the services so tests can supply their own operators.
 */
export interface OperatorIdentity {
  isOperator(userId: number): boolean;
  listOperators(): number[];
}

/**
 * Allow-list fixed at construction, usually from OPERATOR_IDS
 */
export class StaticOperatorIdentity implements OperatorIdentity {
  private readonly operators: ReadonlySet<number>;

  constructor(operatorIds: Iterable<number>) {
    this.operators = new Set(operatorIds);
  }

  isOperator(userId: number): boolean {
    return this.operators.has(userId);
  }

  listOperators(): number[] {
    return [...this.operators];
  }
}

/**
 * Parse a comma separated id list; entries that are not plain digits are ignored
 */
export function parseOperatorIds(raw: string | undefined): number[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => /^\d+$/.test(entry))
    .map((entry) => Number(entry));
}
