export { fromMapping, fromValue } from './from-mapping';
export { toStandardSchema } from './standard-schema';
export {
  type CastTarget,
  type Config,
  type ConfigOptions,
  type FieldPathTable,
  type ForwardReferences,
  type PathSpec,
  type TypeHook,
  SKIP_FIELD,
  createConfig
} from './config';

export { t } from './types/builders';
export { origins } from './types/builtins';
export { LeafType, type LeafSpec } from './types/leaf';
export {
  CollectionOrigin,
  type CollectionShape,
  type CollectionType
} from './types/collection';
export {
  CompositeType,
  type CompositeOptions,
  type Construct,
  type FieldOptions,
  type FieldSpec,
  defineComposite,
  field
} from './types/composite';
export {
  type ForwardRef,
  type TypeDescriptor,
  type UnionType,
  isAncestor
} from './types/descriptors';
export { runtimeTypeOf } from './types/runtime-type';
export { formatType } from './types/format';

export {
  FieldError,
  ForwardReferenceError,
  FrozenInstanceError,
  MappingError,
  MissingValueError,
  PathLookupError,
  StrictUnionMatchError,
  UnexpectedDataError,
  UnionMatchError,
  WrongTypeError
} from './errors';
export { NumericFormatError, parseDecimal, parseInteger } from './utils/numeric';

export { getPath, hasPath, type PathFallback } from './navigator';
export { type FieldDescriptor, resolveFieldTypes } from './reflector';
export { isInstance } from './engine/type-checks';
