import type { LoadingArchive, PointerSlot } from '../archive/Types';
import { GraphIdentityError } from './GraphIdentityError';
import { IdentityMap } from './IdentityMap';
import { IdentityTracker, describeObject } from './IdentityTracker';
import type { TraversalStats } from './Types';

type Fixup = (unit: object | null, pointerIndex: number) => void;

/**
 * Load-side identity tracker
 * 加载端身份跟踪器
 *
 * Records freshly constructed units in traversal order and defers every
 * pointer write. On finalize the identity map is read back and each pointer
 * slot receives the unit found at its object-id.
 * 按遍历顺序记录新构建的单元并延迟所有指针写入。
 */
export class InputTracker extends IdentityTracker<LoadingArchive> {
  readonly direction = 'load';

  /** Object-id -> unit; `undefined` for anonymous units 对象ID -> 单元 */
  private readonly _units: Array<object | null | undefined> = [null];
  private readonly _fixups: Fixup[] = [];

  get stats(): TraversalStats {
    return { units: this._units.length - 1, pointers: this._fixups.length };
  }

  trackIdentity(unit: object | undefined): void {
    this._units.push(unit);
  }

  trackPointer<T extends object>(pointer: PointerSlot<T>): void {
    this._fixups.push((unit, pointerIndex) => {
      if (unit === null) {
        pointer.slot.set(null);
        return;
      }
      if (!(unit instanceof pointer.target)) {
        throw new GraphIdentityError(
          'target-type-mismatch',
          `Pointer ${pointerIndex} expects ${pointer.target.name} but resolves to ${describeObject(unit)}`,
          { pointerIndex }
        );
      }
      pointer.slot.set(unit);
    });
    // Mirrors the save side so object-ids stay aligned
    this.trackIdentity(pointer.holder);
  }

  protected exchange(archive: LoadingArchive): void {
    const map = new IdentityMap();
    archive.visit(map);

    if (map.ids.length !== this._fixups.length) {
      throw new GraphIdentityError(
        'size-mismatch',
        `Identity map holds ${map.ids.length} pointer(s) but the traversal produced ${this._fixups.length}`
      );
    }

    map.ids.forEach((objectId, pointerIndex) => {
      if (!Number.isInteger(objectId) || objectId < 0 || objectId >= this._units.length) {
        throw new GraphIdentityError(
          'id-out-of-range',
          `Pointer ${pointerIndex} has object-id ${objectId} exceeding the object traversal count ${this._units.length}`,
          { pointerIndex, objectId }
        );
      }
      const unit = this._units[objectId];
      if (unit === undefined) {
        throw new GraphIdentityError(
          'unaddressable-target',
          `Pointer ${pointerIndex} has object-id ${objectId}, which names a unit that cannot be referenced`,
          { pointerIndex, objectId }
        );
      }
      this._fixups[pointerIndex](unit, pointerIndex);
    });

    if (this.options.verbose) {
      console.log(`[GraphArchive] Resolved identity map: ${map.ids.length} pointer(s) over ${this._units.length - 1} unit(s)`);
    }
  }
}
