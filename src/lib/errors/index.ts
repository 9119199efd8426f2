export { ConfigurationError, RequestTimeoutError } from "./errors";
