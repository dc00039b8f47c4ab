import { timingSafeEqual } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import {
  ExpiredError,
  NotFoundError,
  ValidationError,
  asOperationId,
  asUndoSessionId
} from "@deckname/core";
import type { RenameRequest } from "@deckname/renamer";
import type { ServerRuntime } from "./bootstrap";
import { readJson, sendJson } from "./http-utils";
import { parseBody, renameRequestSchema, templateRequestSchema } from "./schemas";
import type { RenameRequestBody } from "./schemas";

export interface RequestHandlerOptions {
  authToken?: string;
}

function isAuthorizedRequest(req: IncomingMessage, configuredToken: string): boolean {
  if (!configuredToken) {
    return true;
  }

  const authHeader = req.headers.authorization;
  if (typeof authHeader === "string" && authHeader.startsWith("Bearer ")) {
    const token = authHeader.slice("Bearer ".length).trim();
    if (safeEqual(token, configuredToken)) {
      return true;
    }
  }

  const xAuthToken = req.headers["x-auth-token"];
  if (typeof xAuthToken === "string" && safeEqual(xAuthToken.trim(), configuredToken)) {
    return true;
  }

  if (Array.isArray(xAuthToken) && xAuthToken.some((item) => safeEqual(item.trim(), configuredToken))) {
    return true;
  }

  return false;
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

function toRenameRequest(body: RenameRequestBody): RenameRequest {
  return {
    path: body.path,
    recursive: body.recursive ?? false,
    dryRun: body.dryRun ?? false,
    template: body.template,
    selectedFiles: body.selectedFiles
  };
}

export function createRequestHandler(runtime: ServerRuntime, options: RequestHandlerOptions = {}) {
  const configuredToken = options.authToken?.trim() ?? "";
  const { service, logger } = runtime;

  const sendError = (res: ServerResponse, error: unknown): void => {
    if (error instanceof ValidationError) {
      sendJson(res, 400, {
        error: "validation_failed",
        message: error.message,
        issues: error.issues,
        invalidTokens: error.invalidTokens
      });
      return;
    }
    if (error instanceof NotFoundError) {
      sendJson(res, 404, { error: "not_found", message: error.message });
      return;
    }
    if (error instanceof ExpiredError) {
      sendJson(res, 410, { error: "undo_expired", message: error.message, expiredAt: error.expiredAt });
      return;
    }
    const message = error instanceof Error ? error.message : "unknown_error";
    logger.error("request failed", { error: message });
    sendJson(res, 500, { error: message });
  };

  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const url = req.url ?? "/";
    const fullUrl = new URL(url, `http://${req.headers.host ?? "localhost"}`);
    const parts = fullUrl.pathname.split("/").filter(Boolean);
    const isPublicRoute = method === "GET" && parts.length === 1 && parts[0] === "health";

    try {
      if (!isPublicRoute && !isAuthorizedRequest(req, configuredToken)) {
        sendJson(res, 401, { error: "unauthorized" });
        return;
      }

      if (isPublicRoute) {
        sendJson(res, 200, { status: "ok" });
        return;
      }

      if (method === "POST" && parts.length === 2 && parts[0] === "rename" && parts[1] === "preview") {
        const body = parseBody(renameRequestSchema, await readJson(req));
        sendJson(res, 200, await service.preview(toRenameRequest(body)));
        return;
      }

      if (method === "POST" && parts.length === 2 && parts[0] === "rename" && parts[1] === "execute") {
        const body = parseBody(renameRequestSchema, await readJson(req));
        sendJson(res, 200, await service.execute(toRenameRequest(body)));
        return;
      }

      if (method === "POST" && parts.length === 1 && parts[0] === "operations") {
        const body = parseBody(renameRequestSchema, await readJson(req));
        const operationId = service.startAsync(toRenameRequest(body));
        sendJson(res, 202, { operationId });
        return;
      }

      if (method === "GET" && parts.length === 1 && parts[0] === "operations") {
        sendJson(res, 200, { operations: service.listOperations() });
        return;
      }

      if (parts.length >= 2 && parts[0] === "operations") {
        const operationId = asOperationId(parts[1] ?? "");

        if (method === "GET" && parts.length === 2) {
          sendJson(res, 200, service.poll(operationId));
          return;
        }

        if (method === "POST" && parts.length === 3 && parts[2] === "cancel") {
          service.poll(operationId);
          sendJson(res, 200, { cancelled: service.cancel(operationId) });
          return;
        }

        if (method === "DELETE" && parts.length === 2) {
          if (!service.clear(operationId)) {
            throw new NotFoundError(`Operation not found: ${operationId}`);
          }
          sendJson(res, 200, { cleared: true });
          return;
        }
      }

      if (method === "POST" && parts.length === 2 && parts[0] === "undo") {
        const sessionId = asUndoSessionId(parts[1] ?? "");
        sendJson(res, 200, await service.undo(sessionId));
        return;
      }

      if (method === "POST" && parts.length === 2 && parts[0] === "templates" && parts[1] === "validate") {
        const body = parseBody(templateRequestSchema, await readJson(req));
        sendJson(res, 200, service.validateTemplate(body.template));
        return;
      }

      sendJson(res, 404, { error: "not_found" });
    } catch (error) {
      sendError(res, error);
    }
  };
}
