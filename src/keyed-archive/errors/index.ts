export { UnarchiveError } from './unarchive-error';
export { UnsupportedArchiveError } from './unsupported-archive';
export { OutOfRangeError } from './out-of-range';
export { MissingFieldError } from './missing-field';
export { LengthMismatchError } from './length-mismatch';
export { InvalidLengthError } from './invalid-length';
export { UnsupportedClassError } from './unsupported-class';
export { CyclicReferenceError } from './cyclic-reference';
export { DepthLimitError } from './depth-limit';
export { MalformedError } from './malformed';
