export * from './nodes.js';
export { IdGenerator, DeclarationArena } from './arena.js';
export {
  assertNever,
  isUserType,
  isStreaming,
  unwrapStreaming,
  describeType,
  typeKindLabel,
  collectUserTypes,
  typesEqual,
} from './types.js';
export { groupByPackage, type PackageTree } from './tree.js';
