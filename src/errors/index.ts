export {
  CompositionError,
  InvalidPathError,
  MissingFieldError,
  PathNotFoundError,
  TypeMismatchError,
} from './composition.errors';
export type { CompositionErrorCode } from './composition.errors';
