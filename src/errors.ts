// Raised for any startup condition that would leave the classifier unable to detect abuse.
export class ClassifierConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClassifierConfigError";
  }
}
