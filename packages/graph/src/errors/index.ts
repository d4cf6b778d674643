/**
 * Errors Module
 */

export {
  GraphError,
  DuplicateNodeError,
  NodeNotFoundError,
  PropertyMissingError,
  PropertyTypeMismatchError,
  InvalidPropertyValueError,
  SequenceConsumedError,
} from "./errors"
