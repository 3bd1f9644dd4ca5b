/** Missing endpoint, credential or role wiring. Only ever raised while a service starts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Network/HTTP failure talking to the generation endpoint or to a peer service. */
export class TransportError extends Error {
  status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = "TransportError";
    this.status = status;
  }
}

/** A role that needs structured output got text no extraction strategy could read. */
export class PayloadExtractionError extends Error {
  rawText: string;
  constructor(message: string, rawText: string) {
    super(message);
    this.name = "PayloadExtractionError";
    this.rawText = rawText;
  }
}
