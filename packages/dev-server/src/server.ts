import path from "path";
import fs from "fs-extra";
import Fastify, { type FastifyInstance } from "fastify";
import fastifyStatic, { type ListDir, type ListFile } from "@fastify/static";
import { getLogger, type Access, type Reporter } from "@bookpress/core";

export const NO_CACHE_HEADERS = {
  "cache-control": "no-cache, no-store, must-revalidate",
  pragma: "no-cache",
  expires: "0",
} as const;

export const DEFAULT_PREVIEW_PORT = 8000;

export const bindAddress = (access: Access): string => (access === "public" ? "0.0.0.0" : "127.0.0.1");

/** Browser address of a server on `port`; public servers are also reachable on the host's LAN address. */
export const previewUrl = (port: number): string => `http://localhost:${port}`;

const escapeHtml = (value: string) =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

/** Directory listing for output directories without an index.html, such as LaTeX and PDF builds. */
export const renderListing = (dirs: ListDir[], files: ListFile[]): string => {
  const items = [
    ...dirs.map((dir) => `<li><a href="${escapeHtml(dir.href)}/">${escapeHtml(dir.name)}/</a></li>`),
    ...files.map((file) => `<li><a href="${escapeHtml(file.href)}">${escapeHtml(file.name)}</a></li>`),
  ];
  return `<!DOCTYPE html>\n<html><head><meta charset="utf-8"><title>Directory listing</title></head>\n<body><h1>Directory listing</h1><ul>\n${items.join("\n")}\n</ul></body></html>\n`;
};

export interface PreviewServerOptions {
  directory: string;
  access: Access;
  port?: number;
  logger?: Reporter;
}

export interface PreviewServerHandle {
  app: FastifyInstance;
  directory: string;
  host: string;
  port: number;
  url: string;
  stop: () => Promise<void>;
}

/**
 * Static file server for a build directory. Every reply, 404s included, carries no-cache headers.
 * Directories without an index.html are listed, and `/dir` redirects to `/dir/`.
 */
export const createPreviewServer = async (options: Pick<PreviewServerOptions, "directory" | "logger">) => {
  const logger = options.logger ?? getLogger();
  const root = path.resolve(options.directory);
  if (!(await fs.pathExists(root))) {
    logger.warn({ directory: root }, "Preview directory does not exist yet");
  }

  const app = Fastify({ logger: false });
  app.addHook("onSend", async (_request, reply, payload) => {
    reply.headers(NO_CACHE_HEADERS);
    return payload;
  });
  await app.register(fastifyStatic, {
    root,
    prefix: "/",
    cacheControl: false,
    etag: false,
    lastModified: false,
    index: ["index.html"],
    redirect: true,
    list: { format: "html", names: ["/"], render: renderListing },
  });
  return app;
};

const resolveRunningPort = (app: FastifyInstance, fallback: number) => {
  const address = app.server.address();
  if (address && typeof address === "object" && "port" in address) {
    return address.port;
  }
  return fallback;
};

export const startPreviewServer = async (options: PreviewServerOptions): Promise<PreviewServerHandle> => {
  const logger = options.logger ?? getLogger();
  const directory = path.resolve(options.directory);
  const host = bindAddress(options.access);
  const requestedPort = options.port ?? DEFAULT_PREVIEW_PORT;

  const app = await createPreviewServer({ directory, logger });
  // Node sets SO_REUSEADDR on listening TCP sockets, so a port freed by stop() can be bound again at once.
  await app.listen({ port: requestedPort, host });
  const port = resolveRunningPort(app, requestedPort);
  const url = previewUrl(port);
  logger.info({ host, port, directory }, "Preview server started");
  if (options.access === "public") {
    logger.info({ port }, `Also reachable from other machines on this network at port ${port}`);
  }

  return {
    app,
    directory,
    host,
    port,
    url,
    stop: async () => {
      try {
        await app.close();
      } catch (err) {
        logger.warn({ err }, "Error closing preview server");
      }
      logger.debug({ port }, "Preview server stopped");
    },
  };
};
