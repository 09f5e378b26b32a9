import cors from "cors";
import express, { type Express } from "express";
import { identify, requireIdentity } from "./auth";
import { getCatalog, type Catalog } from "./catalog";
import type { AppConfig } from "./config";
import { errorHandler, notFoundHandler } from "./errors";
import { requestLogger } from "./logger";
import { authRouter } from "./routes/auth";
import { doctorsRouter } from "./routes/doctors";
import { followUpsRouter } from "./routes/followups";
import { healthTipsRouter } from "./routes/healthTips";
import { medicinesRouter } from "./routes/medicines";
import { notificationsRouter } from "./routes/notifications";
import { patientsRouter } from "./routes/patients";
import { prescriptionsRouter } from "./routes/prescriptions";

export const createApp = (config: AppConfig, catalog: Catalog = getCatalog()): Express => {
  const app = express();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);
  app.use(identify(config));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, message: "Server healthy" });
  });

  app.use("/auth", authRouter(config));

  // Everything below accepts anonymous callers unless the deployment turns that off.
  if (!config.allowAnonymous) {
    app.use(requireIdentity);
  }

  app.use("/doctors", doctorsRouter());
  app.use("/patients", patientsRouter());
  app.use("/prescriptions", prescriptionsRouter());
  app.use("/medicines", medicinesRouter(catalog));
  app.use("/health-tips", healthTipsRouter());
  app.use("/notifications", notificationsRouter());
  app.use("/followups", followUpsRouter());

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};
