/**
 * Scoped graph archives
 * 作用域图存档
 *
 * Each helper owns one wrapper for the duration of a callback and completes
 * it exactly once on every exit path. When the callback throws, completion
 * still runs; a failure there is logged and the callback's error is rethrown.
 * 每个辅助函数在回调期间持有一个包装器，并在所有退出路径上恰好完成一次。
 */

import { InputArchive } from '../archive/InputArchive';
import { OutputArchive } from '../archive/OutputArchive';
import type {
  EncodingVisitor,
  LoadingArchive,
  SavingArchive,
  SerializedArchive,
  Visitable
} from '../archive/Types';
import type { GraphArchive } from './GraphArchive';
import { GraphInputArchive, GraphOutputArchive } from './GraphArchive';
import type { IdentityTracker } from './IdentityTracker';
import type { GraphArchiveOptions, LoadGraphOptions, SaveGraphOptions } from './Types';

function runScoped<G extends Pick<GraphArchive<EncodingVisitor, IdentityTracker<EncodingVisitor>>, 'dispose'>, R>(
  graph: G,
  body: (graph: G) => R
): R {
  let result: R;
  try {
    result = body(graph);
  } catch (error) {
    try {
      graph.dispose();
    } catch (completionError) {
      const message = completionError instanceof Error ? completionError.message : String(completionError);
      console.warn(`[GraphArchive] Completion failed after an aborted traversal: ${message}`);
    }
    throw error;
  }
  graph.dispose();
  return result;
}

/**
 * Run a save traversal with guaranteed completion
 * 运行保证完成的保存遍历
 */
export function withGraphOutput<R>(
  archive: SavingArchive,
  body: (graph: GraphOutputArchive) => R,
  options: GraphArchiveOptions = {}
): R {
  return runScoped(new GraphOutputArchive(archive, options), body);
}

/**
 * Run a load traversal with guaranteed completion
 * 运行保证完成的加载遍历
 */
export function withGraphInput<R>(
  archive: LoadingArchive,
  body: (graph: GraphInputArchive) => R,
  options: GraphArchiveOptions = {}
): R {
  return runScoped(new GraphInputArchive(archive, options), body);
}

/**
 * Save a graph in one call
 * 一次调用保存整个图
 *
 * @example
 * ```typescript
 * const { data } = saveGraph([scene], { format: ArchiveFormat.JSON });
 * const restored = new Scene();
 * loadGraph(data, [restored]);
 * ```
 */
export function saveGraph(roots: Visitable[], options: SaveGraphOptions = {}): SerializedArchive {
  const archive = new OutputArchive(options);
  withGraphOutput(archive, (graph) => {
    graph.visit(...roots);
  }, options);
  return archive.finish();
}

/**
 * Load a graph into freshly constructed roots
 * 将图加载到新构建的根对象中
 */
export function loadGraph(data: string | Uint8Array, roots: Visitable[], options: LoadGraphOptions = {}): void {
  const archive = new InputArchive(data, options);
  withGraphInput(archive, (graph) => {
    graph.visit(...roots);
  }, options);
}
