export class UnsupportedMessageShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedMessageShapeError";
  }
}
