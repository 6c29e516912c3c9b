export { parse } from './parser.js';
export type { ParseOptions } from './parser.js';
export { dump } from './stringify.js';
export {
  nullValue,
  boolValue,
  integerValue,
  bigIntegerValue,
  floatValue,
  stringValue,
  arrayValue,
  objectValue,
  isGuraObject,
  isGuraArray,
  isGuraString,
  isGuraInteger,
  isGuraFloat,
  isGuraBool,
  isGuraNull,
  valuesEqual,
} from './ast.js';
export type {
  GuraValue,
  GuraNull,
  GuraBool,
  GuraInteger,
  GuraBigInteger,
  GuraFloat,
  GuraString,
  GuraArray,
  GuraObject,
  VariableValue,
} from './ast.js';
export { GuraError, ErrorKind } from './errors.js';
export { nodeFileSystem } from './files.js';
export type { FileSystem } from './files.js';
export type { Environment } from './variables.js';
