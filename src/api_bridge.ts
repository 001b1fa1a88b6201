import express, { ErrorRequestHandler, Request, Response } from "express";
import cors from "cors";
import type { Server } from "http";
import { ZodError } from "zod";
import { MalformedQueryError, ReconError, getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { ExtendRequestSchema, QueryBatchSchema, ReconService } from "./recon-service.js";

const logger = createLogger("ApiBridge");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A request parameter from the form/JSON body, falling back to the query string. */
function param(req: Request, name: string): unknown {
  const body: unknown = req.body;
  if (isRecord(body) && body[name] !== undefined) return body[name];
  const value: unknown = req.query[name];
  return Array.isArray(value) ? value[0] : value;
}

function stringParam(req: Request, name: string): string | undefined {
  const value = param(req, name);
  return typeof value === "string" ? value : undefined;
}

/** JSON-encoded parameters arrive as strings from forms and query strings, as objects from JSON bodies. */
function jsonParam(req: Request, name: string): unknown {
  const value = param(req, name);
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new MalformedQueryError(`Parameter '${name}' is not valid JSON: ${getErrorMessage(error)}`);
  }
}

function limitParam(req: Request): number | undefined {
  const raw = stringParam(req, "limit");
  if (raw === undefined || raw === "") return undefined;
  const limit = Number(raw);
  if (!Number.isInteger(limit)) throw new MalformedQueryError(`Parameter 'limit' must be an integer, got '${raw}'`);
  return limit;
}

function statusFor(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof ReconError) {
    switch (error.code) {
      case "malformed_input":
        return 400;
      case "not_found":
        return 404;
      default:
        return 500;
    }
  }
  return 500;
}

function messageFor(error: unknown): string {
  if (error instanceof ZodError) {
    return "Invalid input: " + error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  }
  return getErrorMessage(error);
}

// res.jsonp wraps the payload when a `callback` query parameter is present
function send(res: Response, status: number, payload: unknown): void {
  res.status(status).jsonp(payload);
}

function route(handler: (req: Request) => unknown | Promise<unknown>) {
  return (req: Request, res: Response): void => {
    Promise.resolve()
      .then(() => handler(req))
      .then(
        (payload) => send(res, 200, payload),
        (error: unknown) => {
          const status = statusFor(error);
          if (status === 500) logger.error(`${req.method} ${req.path} failed`, { error: getErrorMessage(error) });
          send(res, status, { error: messageFor(error) });
        },
      )
      .catch((error: unknown) => logger.error("Failed to write response", { error: getErrorMessage(error) }));
  };
}

/** Express app serving the reconciliation API under `prefix`. */
export function createApiApp(service: ReconService, prefix: string): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const base = prefix === "/" ? "" : prefix;

  const reconcile = route(async (req) => {
    const queries = jsonParam(req, "queries");
    if (queries !== undefined) {
      return service.queryBatch(QueryBatchSchema.parse(queries));
    }
    const extend = jsonParam(req, "extend");
    if (extend !== undefined) {
      return service.extend(ExtendRequestSchema.parse(extend));
    }
    return service.manifest();
  });
  app.get(base || "/", reconcile);
  app.post(base || "/", reconcile);

  app.get(`${base}/auto/entities`, route((req) => service.suggestEntities(stringParam(req, "prefix") ?? "", limitParam(req))));
  app.get(`${base}/auto/types`, route((req) => service.suggestTypes(stringParam(req, "prefix") ?? "", limitParam(req))));
  app.get(`${base}/auto/properties`, route((req) => service.suggestProperties(stringParam(req, "prefix") ?? "", limitParam(req))));

  app.get(
    `${base}/properties`,
    route((req) => {
      const type = stringParam(req, "type");
      if (!type) throw new MalformedQueryError("Parameter 'type' is required");
      return service.listProperties(type, limitParam(req));
    }),
  );

  app.use((req: Request, res: Response) => {
    send(res, 404, { error: `No route for ${req.method} ${req.path}` });
  });

  // malformed JSON bodies are rejected by express.json() before any route runs
  const bodyErrors: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    const status = isRecord(error) && typeof error.status === "number" && error.status < 500 ? error.status : 500;
    send(res, status, { error: getErrorMessage(error) });
  };
  app.use(bodyErrors);

  return app;
}

export function startHttpServer(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => {
      logger.info(`Listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}

export function stopHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
