import { NextResponse } from "next/server";
import { ZodError, type ZodType, type ZodTypeDef } from "zod";

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message?: string
  ) {
    super(message ?? code);
    this.name = "ApiError";
  }
}

export function ok(data: Record<string, unknown> = {}, status = 200): NextResponse {
  return NextResponse.json({ ok: true, ...data }, { status });
}

export function fail(status: number, error: string, message?: string): NextResponse {
  return NextResponse.json(message ? { ok: false, error, message } : { ok: false, error }, { status });
}

export function parse<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, value: unknown): Out {
  return schema.parse(value);
}

export async function readJson(request: Request): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ApiError(400, "invalid_json");
  }
}

export async function readBody<Out, In>(request: Request, schema: ZodType<Out, ZodTypeDef, In>): Promise<Out> {
  return schema.parse(await readJson(request));
}

export function searchParams(request: Request): URLSearchParams {
  return new URL(request.url).searchParams;
}

export function intParam(params: URLSearchParams, name: string, fallback: number, max?: number): number {
  const raw = params.get(name);
  const n = raw === null ? NaN : Number.parseInt(raw, 10);
  const value = Number.isFinite(n) && n >= 0 ? n : fallback;
  return max === undefined ? value : Math.min(value, max);
}

export type RouteContext<P> = { params: P };

/**
 * Wraps a route handler with the JSON error envelope. ApiError maps to its own
 * status, zod failures to 400 validation_failed, anything else to 500.
 */
export function route<P = Record<string, never>>(
  tag: string,
  handler: (request: Request, context: RouteContext<P>) => Promise<Response>
): (request: Request, context: RouteContext<P>) => Promise<Response> {
  return async (request, context) => {
    try {
      return await handler(request, context);
    } catch (e) {
      if (e instanceof ApiError) return fail(e.status, e.code, e.message === e.code ? undefined : e.message);
      if (e instanceof ZodError) {
        return NextResponse.json({ ok: false, error: "validation_failed", issues: e.issues }, { status: 400 });
      }
      // eslint-disable-next-line no-console
      console.error(`[${tag} error]`, e);
      return fail(500, "server_error");
    }
  };
}
