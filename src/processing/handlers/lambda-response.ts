export interface LambdaResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export function jsonResponse(statusCode: number, body: unknown): LambdaResponse {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function errorResponse(statusCode: number, error: string, message: string): LambdaResponse {
  return jsonResponse(statusCode, { error, message });
}
