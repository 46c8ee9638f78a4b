export interface ResponseRequest {
  readonly challenge: string;
  /** What the player wants the response to say */
  readonly idea: string;
  readonly displayName: string;
}

export interface ResponseGenerator {
  generate(request: ResponseRequest, signal?: AbortSignal): Promise<string>;
}
