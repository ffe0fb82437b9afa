export class PatternSyntaxError extends Error {
  constructor(
    message: string,
    public input: string,
    public token?: string
  ) {
    super(`Pattern syntax error in '${input}': ${message}`);
    this.name = 'PatternSyntaxError';
  }
}

/**
 * A binary node declares an operand width that differs from the output width
 * of the operand's own sub-expression.
 */
export class WidthConsistencyError extends Error {
  constructor(
    public parent: string,
    public child: string,
    public declared: string,
    public actual: string
  ) {
    super(`In \`${parent}\`, subexpression \`${child}\` has inconsistent width: ${declared} != ${actual}`);
    this.name = 'WidthConsistencyError';
  }
}

export class RuleDefinitionError extends Error {
  constructor(
    message: string,
    public rule: string
  ) {
    super(`Invalid rule '${rule}': ${message}`);
    this.name = 'RuleDefinitionError';
  }
}

/**
 * Two e-classes with different known constants were merged.
 * Only an unsound rewrite can cause this.
 */
export class ConstantConflictError extends Error {
  constructor(
    public eclass: number,
    public existing: number,
    public incoming: number
  ) {
    super(`Cannot merge constant ${incoming} into e-class ${eclass} holding ${existing}`);
    this.name = 'ConstantConflictError';
  }
}
