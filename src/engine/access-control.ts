/** Decides which callers may run operator-only actions. */
export interface AccessControl {
  isAuthorized(caller: string): boolean;
}

export class OperatorAccessControl implements AccessControl {
  private readonly operators: Set<string>;

  constructor(operators: string[]) {
    this.operators = new Set(operators);
  }

  isAuthorized(caller: string): boolean {
    return this.operators.has(caller);
  }
}
