import { ChunkingError } from "../utils/errors";

/**
 * Error indicating that a pipeline run was cancelled through its abort signal.
 */
export class CancellationError extends ChunkingError {
  constructor(message = "Operation cancelled") {
    super(message);
  }
}
