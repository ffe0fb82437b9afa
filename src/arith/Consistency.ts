import { patternChildren, patternsEqual, patternToString } from '../egraph/Pattern.js';
import type { Pattern } from '../egraph/Pattern.js';
import { WidthConsistencyError } from '../Errors.js';

/**
 * Checks that input and output widths of operations are consistent.
 *
 * Wherever an operand of a binary node is itself a binary node, the width
 * declared for that operand must be the very same slot expression as the
 * operand's own output width. Variables, literals and width helpers carry no
 * declared width and are not checked.
 *
 * @throws WidthConsistencyError naming the parent, the operand and both widths
 */
export function checkWidthConsistency(pattern: Pattern): void {
  if (pattern.tag === 'pbinary') {
    for (const operand of [pattern.a, pattern.b]) {
      const child = operand.expr;
      if (child.tag === 'pbinary' && !patternsEqual(operand.width, child.width)) {
        throw new WidthConsistencyError(
          patternToString(pattern),
          patternToString(child),
          patternToString(operand.width),
          patternToString(child.width)
        );
      }
    }
  }
  patternChildren(pattern).forEach(checkWidthConsistency);
}
