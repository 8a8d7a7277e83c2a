import type { PointerSlot, SavingArchive } from '../archive/Types';
import { GraphIdentityError } from './GraphIdentityError';
import { IdentityMap } from './IdentityMap';
import { IdentityTracker, describeObject } from './IdentityTracker';
import type { ObjectId, TraversalStats } from './Types';
import { NULL_OBJECT_ID } from './Types';

/**
 * Save-side identity tracker
 * 保存端身份跟踪器
 *
 * Associates every traversed unit with the next object-id and records the
 * current target of every pointer. On finalize the targets are translated
 * to object-ids and appended to the real archive.
 * 为每个遍历的单元分配下一个对象ID，并记录每个指针当前的目标。
 */
export class OutputTracker extends IdentityTracker<SavingArchive> {
  readonly direction = 'save';

  /** Object identity -> most recent object-id 对象身份 -> 最近的对象ID */
  private readonly _ids = new Map<object, ObjectId>();
  private _nextId: ObjectId = NULL_OBJECT_ID + 1;
  private readonly _targets: Array<object | null> = [];

  get stats(): TraversalStats {
    return { units: this._nextId - 1, pointers: this._targets.length };
  }

  /**
   * Object-id most recently assigned to an object
   * 最近分配给对象的对象ID
   */
  idOf(unit: object): ObjectId | undefined {
    return this._ids.get(unit);
  }

  trackIdentity(unit: object | undefined): void {
    const id = this._nextId++;
    // Repeat visits overwrite the earlier id: the last visit is the canonical target
    if (unit !== undefined) {
      this._ids.set(unit, id);
    }
  }

  trackPointer<T extends object>(pointer: PointerSlot<T>): void {
    this._targets.push(pointer.slot.get());
    // The slot takes the next position; its holder, if any, may be a target itself
    this.trackIdentity(pointer.holder);
  }

  protected exchange(archive: SavingArchive): void {
    const ids = this._targets.map((target, pointerIndex) => {
      if (target === null) {
        return NULL_OBJECT_ID;
      }
      const id = this._ids.get(target);
      if (id === undefined) {
        throw new GraphIdentityError(
          'target-not-tracked',
          `Pointer ${pointerIndex} targets ${describeObject(target)} not found in the serialization traversal`,
          { pointerIndex }
        );
      }
      return id;
    });

    archive.visit(new IdentityMap(ids));

    if (this.options.verbose) {
      console.log(`[GraphArchive] Saved identity map: ${ids.length} pointer(s) over ${this._nextId - 1} unit(s)`);
    }
  }
}
