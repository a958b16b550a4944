export class MalformedInputError extends Error {
  readonly index: number;

  constructor(message: string, index: number) {
    super(message);
    this.name = "MalformedInputError";
    this.index = index;
  }
}
