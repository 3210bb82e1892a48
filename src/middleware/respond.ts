import type { Request } from "express";

export type ApiMeta = { requestId: string };

export type ApiErrorCode =
  | "VALIDATION_FAILED"
  | "FOOD_ITEM_NOT_FOUND"
  | "INVALID_JSON"
  | "PAYLOAD_TOO_LARGE"
  | "ROUTE_NOT_FOUND"
  | "INTERNAL_ERROR";

export type ApiErrorBody = {
  meta: ApiMeta;
  error: {
    code: ApiErrorCode;
    message: string;
    fields?: Record<string, string[]>;
  };
};

export function apiMeta(req: Request): ApiMeta {
  return { requestId: req.requestId };
}

export function apiOk<T>(req: Request, data: T) {
  return { meta: apiMeta(req), data };
}

export function apiErr(
  req: Request,
  code: ApiErrorCode,
  message: string,
  status = 400,
  fields?: Record<string, string[]>
): { status: number; body: ApiErrorBody } {
  return {
    status,
    body: {
      meta: apiMeta(req),
      error: fields ? { code, message, fields } : { code, message },
    },
  };
}
