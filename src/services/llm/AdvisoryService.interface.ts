export interface AdvisoryRequest {
  systemPrompt: string;
  userPrompt: string;
}

export interface AdvisoryService {
  /** Returns the raw model text; callers parse and validate it. */
  advise(request: AdvisoryRequest): Promise<string>;
  testConnection(): Promise<boolean>;
}
