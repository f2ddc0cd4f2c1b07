import { throwIllegalValue } from '@cardprod/basics';

/**
 * What to do about a secret that has a desired and a current value, either of
 * which may be unset (meaning the factory default).
 */
export type ReconcilePlan<P> =
  | { type: 'keep' }
  | { type: 'restore-default'; current: P }
  | { type: 'change'; desired: P; current?: P };

/**
 * What a procedure did about a secret.
 */
export type ReconcileOutcome = 'unchanged' | 'changed' | 'restored-default';

/**
 * Decides whether the card's value must change.
 *
 * | desired | current          | plan            |
 * |---------|------------------|-----------------|
 * | unset   | unset            | keep            |
 * | unset   | set              | restore-default |
 * | set     | unset or differs | change          |
 * | set     | equal            | keep            |
 */
export function planReconcile<P extends { equals(other?: P): boolean }>({
  desired,
  current,
}: {
  desired?: P;
  current?: P;
}): ReconcilePlan<P> {
  if (desired === undefined) {
    return current === undefined
      ? { type: 'keep' }
      : { type: 'restore-default', current };
  }
  if (desired.equals(current)) {
    return { type: 'keep' };
  }
  return { type: 'change', desired, current };
}

export function reconcileOutcome<P>(plan: ReconcilePlan<P>): ReconcileOutcome {
  switch (plan.type) {
    case 'keep':
      return 'unchanged';
    case 'restore-default':
      return 'restored-default';
    case 'change':
      return 'changed';
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(plan);
  }
}
