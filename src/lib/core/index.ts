/**
 * Inspection tree model, identity tracking and errors.
 */

export type {
  ValueKind,
  NodeKind,
  ContainerKind,
  InspectNode,
  ScalarNode,
  BoundMethodNode,
  PartialCallNode,
  PartialParameter,
  ContainerNode,
  DuplicateNode
} from './types.js';
export {
  isScalarNode,
  isBoundMethodNode,
  isPartialCallNode,
  isContainerNode,
  isDuplicateNode,
  isTruncated
} from './types.js';
export { IdentityTracker, hasIdentity } from './identity.js';
export { InspectionError, describeError, safeString } from './errors.js';
