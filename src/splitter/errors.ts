import { ConfigurationError } from "../utils/errors";

/**
 * Thrown when split options cannot produce bounded pieces, e.g. an overlap
 * that is not smaller than the maximum size.
 */
export class SplitOptionsError extends ConfigurationError {}
