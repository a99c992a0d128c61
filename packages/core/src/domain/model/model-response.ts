interface ModelResponseBase {
  /** Backend identifier, or a caller label such as "claude" in council mode */
  model: string;
  elapsedSeconds: number;
}

export interface ModelSuccess extends ModelResponseBase {
  success: true;
  response: string;
  error?: undefined;
}

export interface ModelFailure extends ModelResponseBase {
  success: false;
  /** Always empty; failures carry their cause in `error` */
  response: '';
  error: string;
}

export type ModelResponse = ModelSuccess | ModelFailure;

export function succeeded(model: string, response: string, elapsedSeconds: number): ModelSuccess {
  return { model, response, elapsedSeconds, success: true };
}

export function failed(model: string, error: string, elapsedSeconds: number): ModelFailure {
  return { model, response: '', elapsedSeconds, success: false, error };
}

/** Text to forward into a follow-up prompt; failed responses become `placeholder`. */
export function responseTextOr(response: ModelResponse, placeholder: string): string {
  return response.success ? response.response : placeholder;
}
