import { DisplayableError } from "../utils/errors.js";

export class ConfigurationError extends DisplayableError {
  constructor(message: string, detailLines: readonly string[] = []) {
    super(message, { detailLines });
    this.name = "ConfigurationError";
  }
}
