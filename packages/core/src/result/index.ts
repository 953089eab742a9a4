export { ConfigError, ForceGateError, toError } from "./errors";
export { Err, Ok, type Result } from "./result";
