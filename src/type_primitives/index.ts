export {
  assert,
  validate,
  is_non_negative_integer,
  is_non_null,
  is_safe_integer,
} from "./assertions";
export { TypeError, TYPE_ERROR } from "./error";
export {
  NONE,
  OK_VOID,
  err,
  map_option,
  ok,
  some,
  unwrap,
  unwrap_or,
  type Err,
  type None,
  type Ok,
  type Option,
  type Result,
  type Some,
} from "./result";
