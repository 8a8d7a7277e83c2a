/**
 * graph-archive - Pointer identity preservation for archive traversals
 * 存档遍历的指针身份保持
 *
 * @packageDocumentation
 */

// Archive engine
export { OutputArchive } from './archive/OutputArchive';
export { InputArchive } from './archive/InputArchive';
export { ArchiveError } from './archive/ArchiveError';
export type { ArchiveErrorReason } from './archive/ArchiveError';
export {
  decodeEnvelope,
  encodeEnvelope,
  formatVersion,
  isArchiveToken,
  isVersionCompatible
} from './archive/Codec';
export { ArchiveNode } from './archive/ArchiveNode';
export {
  dispatch,
  isArchiveNode,
  isEncodingVisitor,
  isTrackingVisitor
} from './archive/Dispatch';
export {
  binary,
  BinaryData,
  defer,
  DeferredData,
  field,
  isScalar,
  list,
  ListField,
  named,
  NameValuePair,
  ScalarArray,
  ScalarField,
  sizeTag,
  SizeTag,
  values
} from './archive/Values';
export {
  ArchiveFormat,
  CURRENT_ARCHIVE_VERSION,
  DEFAULT_INPUT_ARCHIVE_OPTIONS,
  DEFAULT_OUTPUT_ARCHIVE_OPTIONS
} from './archive/Types';
export type {
  Archive,
  ArchiveDirection,
  ArchiveEnvelope,
  ArchiveToken,
  ArchiveVersion,
  Constructor,
  EncodingVisitor,
  InputArchiveOptions,
  LoadingArchive,
  OutputArchiveOptions,
  PointerSlot,
  SavingArchive,
  Scalar,
  Serializable,
  SerializedArchive,
  Slot,
  TrackingVisitor,
  Visitable,
  Visitor
} from './archive/Types';

// Identity layer
export { RawPointerRef, RawPtr, rawPtr, ThisRef, thisRef } from './graph/Adapters';
export { GraphIdentityError } from './graph/GraphIdentityError';
export type { GraphIdentityErrorReason } from './graph/GraphIdentityError';
export { IdentityMap } from './graph/IdentityMap';
export { IdentityTracker } from './graph/IdentityTracker';
export { OutputTracker } from './graph/OutputTracker';
export { InputTracker } from './graph/InputTracker';
export { GraphArchive, GraphInputArchive, GraphOutputArchive } from './graph/GraphArchive';
export { loadGraph, saveGraph, withGraphInput, withGraphOutput } from './graph/Scope';
export { DEFAULT_GRAPH_ARCHIVE_OPTIONS, NULL_OBJECT_ID } from './graph/Types';
export type {
  GraphArchiveOptions,
  LoadGraphOptions,
  ObjectId,
  SaveGraphOptions,
  TraversalStats
} from './graph/Types';
