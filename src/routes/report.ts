import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, join } from "node:path";

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import { isInsideDirectory } from "../output/output_writer";

export type ReportRoutesOptions = {
  reportDir: string;
};

const RANK_DIR_PATTERN = /^rank_(\d+)$/;

const RankParamsSchema = z.object({
  rank: z.coerce.number().int().nonnegative(),
});

const FileParamsSchema = z.object({
  "*": z.string().min(1),
});

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".jsonl": "application/x-ndjson; charset=utf-8",
  ".txt": "text/plain; charset=utf-8",
  ".log": "text/plain; charset=utf-8",
};

const contentTypeFor = (path: string): string => CONTENT_TYPES[extname(path)] ?? "application/octet-stream";

const sendJsonFile = (reply: FastifyReply, path: string) => {
  if (!existsSync(path)) {
    return reply.code(404).send({ error: "not_found" });
  }
  return reply.header("content-type", CONTENT_TYPES[".json"]).send(readFileSync(path, "utf8"));
};

/** Read-only view over a report directory written by `parse` or `all-ranks`. */
export async function reportRoutes(app: FastifyInstance, opts: ReportRoutesOptions) {
  const { reportDir } = opts;

  app.get("/report/compile-directory", async (_req, reply) => {
    return sendJsonFile(reply, join(reportDir, "compile_directory.json"));
  });

  app.get("/report/diagnostics", async (_req, reply) => {
    return sendJsonFile(reply, join(reportDir, "diagnostics.json"));
  });

  app.get("/report/ranks", async () => {
    if (!existsSync(reportDir)) return { ranks: [] };
    const ranks: number[] = [];
    for (const name of readdirSync(reportDir)) {
      const match = RANK_DIR_PATTERN.exec(name);
      if (match && statSync(join(reportDir, name)).isDirectory()) ranks.push(Number(match[1]));
    }
    return { ranks: ranks.sort((a, b) => a - b) };
  });

  app.get("/report/ranks/:rank/compile-directory", async (req, reply) => {
    const parsed = RankParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }
    return sendJsonFile(reply, join(reportDir, `rank_${parsed.data.rank}`, "compile_directory.json"));
  });

  app.get("/report/files/*", async (req, reply) => {
    const parsed = FileParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }
    const target = join(reportDir, parsed.data["*"]);
    if (!isInsideDirectory(reportDir, target)) {
      return reply.code(400).send({ error: "path_outside_report" });
    }
    if (!existsSync(target) || !statSync(target).isFile()) {
      return reply.code(404).send({ error: "not_found" });
    }
    return reply.header("content-type", contentTypeFor(target)).send(readFileSync(target));
  });
}
