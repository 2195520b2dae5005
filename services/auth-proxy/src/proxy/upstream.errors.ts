export class UpstreamRequestError extends Error {
  public constructor(
    message: string,
    public readonly timedOut: boolean,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'UpstreamRequestError';
  }
}
