import { isMaternalError } from "../errors";
import { MaternalService } from "../service";

const RPC_PREFIX = "/api/maternal/rpc/";

export interface RouteRequest {
  method: string;
  pathname: string;
  body: string;
}

export interface RouteResponse {
  status: number;
  payload: unknown;
}

export function routeRequest(service: MaternalService, req: RouteRequest): RouteResponse {
  if (req.method === "GET" && req.pathname === "/health") {
    return {
      status: 200,
      payload: { ok: true, service: "maternal-records", ...service.health() },
    };
  }

  if (req.method === "GET" && req.pathname === "/api/maternal/rules") {
    return { status: 200, payload: service.store.rules };
  }

  if (req.method === "POST" && req.pathname.startsWith(RPC_PREFIX)) {
    const rawOperation = req.pathname.slice(RPC_PREFIX.length);
    const operation = decodeOperation(rawOperation);
    if (operation === null) {
      return rpcFailure(404, "UNKNOWN_OPERATION", `Unknown operation: ${rawOperation}`);
    }
    const parsed = parseBody(req.body);
    if (!parsed.ok) {
      return rpcFailure(400, "INVALID_JSON", "Request body must be a JSON object.");
    }
    return invokeOperation(service, operation, parsed.value);
  }

  return { status: 404, payload: { error: "Not found" } };
}

/** JSON.stringify that writes bigint timestamps as decimal strings. */
export function toJson(payload: unknown): string {
  return JSON.stringify(payload, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

function invokeOperation(service: MaternalService, operation: string, payload: unknown): RouteResponse {
  try {
    const result = service.invoke(operation, payload);
    return { status: 200, payload: { ok: true, result } };
  } catch (error) {
    if (isMaternalError(error)) {
      const safe = error.toSafeError();
      return rpcFailure(safe.statusCode, safe.code, safe.message);
    }
    return rpcFailure(500, "INTERNAL_ERROR", "Internal server error");
  }
}

function decodeOperation(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

function rpcFailure(status: number, code: string, message: string): RouteResponse {
  return { status, payload: { ok: false, error: { code, message } } };
}

function parseBody(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    const value = JSON.parse(raw) as unknown;
    if (!isRecord(value)) return { ok: false };
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
