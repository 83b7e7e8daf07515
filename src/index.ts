import Fastify from "fastify";
import cors from "@fastify/cors";

import { healthRoutes } from "./routes/healthz";
import { reportRoutes } from "./routes/report";

const reportDir = process.env.REPORT_DIR ?? "tl_out";
const port = Number(process.env.PORT ?? 3333);

const app = Fastify({ logger: true });

async function main() {
  // Report pages are opened from other local origins.
  app.register(cors, { origin: true });

  app.register(healthRoutes);
  app.register(reportRoutes, { prefix: "/v1", reportDir });

  await app.listen({ port, host: "0.0.0.0" });
  app.log.info({ reportDir }, "report_server.listening");
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
