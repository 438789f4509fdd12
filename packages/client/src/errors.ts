export class RunnerApiRequestError extends Error {
  public constructor(
    public readonly kind: "http" | "network" | "invalid-token" | "invalid-response",
    message: string,
    public readonly status?: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = "RunnerApiRequestError";
  }
}
