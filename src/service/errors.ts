import { DisplayableError, type HintedErrorOptions } from "../utils/errors.js";

export class ServiceStartupError extends DisplayableError {
  constructor(message: string, options: HintedErrorOptions = {}) {
    super(message, options);
    this.name = "ServiceStartupError";
  }
}
