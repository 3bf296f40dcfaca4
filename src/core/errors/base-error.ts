export abstract class BaseError extends Error {
  constructor(
    public code: string,
    public status: number,
    message?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}
