export { type Option, Some, None, isSome, isNone, getOrElse } from "./option.js";
export {
  type Either,
  Left,
  Right,
  isLeft,
  isRight,
  map as mapEither,
  match as matchEither,
} from "./either.js";
