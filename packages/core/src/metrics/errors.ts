export class ReferenceTextError extends Error {
  constructor(message = "Reference text is empty after normalization") {
    super(message);
    this.name = "ReferenceTextError";
  }
}
