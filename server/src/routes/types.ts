// ============================================================
// Deepsky Chart - Route Handler Types
// The slices of Express' request and response the handlers use.
// ============================================================

export interface JsonRequest {
  body?: unknown;
  query?: Record<string, unknown>;
}

export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}
