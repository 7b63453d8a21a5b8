import { Hono } from "hono";
import { cors } from "hono/cors";
import { InputError, describeError } from "./errors.js";
import type { MessagingFlow } from "./pipeline/messaging-flow.js";
import type { TriageOrchestrator } from "./pipeline/triage-orchestrator.js";
import { registerAnalyzeRoute } from "./routes/analyze.js";
import { registerConsentRoute } from "./routes/consent.js";
import { registerSendWhatsAppRoute } from "./routes/send-whatsapp.js";
import { type ServiceDescriptor, registerStatusRoutes } from "./routes/status.js";
import { registerTranslateRoute } from "./routes/translate.js";
import type { ComplianceLedger } from "./services/compliance-ledger.js";
import type { ServiceLogger } from "./services/logger.js";
import type { TranslationAdapter } from "./services/translation-adapter.js";

export type AppDeps = {
  descriptor: ServiceDescriptor;
  corsOrigins: string[];
  orchestrator: TriageOrchestrator;
  messagingFlow: MessagingFlow;
  translator: TranslationAdapter;
  ledger: ComplianceLedger;
  logger: ServiceLogger;
};

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();
  const { logger } = deps;

  app.use(
    "*",
    cors({
      origin: (origin) => {
        if (deps.corsOrigins.length === 0) {
          return origin || "*";
        }
        return deps.corsOrigins.includes(origin) ? origin : null;
      },
      allowMethods: ["GET", "POST", "OPTIONS"],
    }),
  );

  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.info(`[triage] ${c.req.method} ${c.req.path} -> ${c.res.status} (${Date.now() - startedAt}ms)`);
  });

  registerStatusRoutes(app, { descriptor: deps.descriptor, ledger: deps.ledger });
  registerAnalyzeRoute(app, { orchestrator: deps.orchestrator });
  registerSendWhatsAppRoute(app, { messagingFlow: deps.messagingFlow });
  registerTranslateRoute(app, { translator: deps.translator, logger });
  registerConsentRoute(app, { ledger: deps.ledger, logger });

  app.notFound((c) => c.json({ error: "Not found." }, 404));

  app.onError((error, c) => {
    if (error instanceof InputError) {
      logger.warn(`[triage] rejected ${c.req.method} ${c.req.path}: ${error.details.join("; ") || error.message}`);
      return c.json({ error: error.message, details: error.details }, 400);
    }
    const described = describeError(error);
    logger.error(`[triage] unhandled error on ${c.req.method} ${c.req.path}: ${described.type}: ${described.message}`);
    return c.json({ error: "Internal server error." }, 500);
  });

  return app;
}
