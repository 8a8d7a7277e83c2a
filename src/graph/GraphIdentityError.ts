/**
 * Graph identity errors
 * 图身份错误
 *
 * Every failure of the identity layer is reported with this single error
 * kind. `reason` tells the causes apart; none of them is recoverable, the
 * traversal that raised it must be abandoned.
 * 身份层的所有失败都使用此错误类型报告，`reason` 区分具体原因。
 */

export type GraphIdentityErrorReason =
  /** Save: a pointer targets an object never visited by the traversal */
  | 'target-not-tracked'
  /** Load: identity map length differs from the live pointer count */
  | 'size-mismatch'
  /** Load: an object-id is outside the units constructed so far */
  | 'id-out-of-range'
  /** Load: an object-id names a unit that cannot be referenced */
  | 'unaddressable-target'
  /** Load: the resolved object is not an instance of the pointer's target type */
  | 'target-type-mismatch'
  /** Save or load: visit after completion */
  | 'use-after-complete';

export class GraphIdentityError extends Error {
  constructor(
    public readonly reason: GraphIdentityErrorReason,
    message: string,
    public readonly details: { pointerIndex?: number; objectId?: number } = {}
  ) {
    super(message);
    this.name = 'GraphIdentityError';
  }
}
