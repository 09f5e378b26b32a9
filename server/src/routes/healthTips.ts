import { Router } from "express";
import { MANAGING_HYPERTENSION, healthTips, patientHealthTips } from "../fixtures";
import { newId } from "../ids";
import type { HealthTip } from "../types";
import { healthTipCreateSchema, parseBody } from "../validation";

export const healthTipsRouter = (): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(healthTips());
  });

  router.post("/", (req, res) => {
    const body = parseBody(healthTipCreateSchema, req.body);
    const tip: HealthTip = {
      id: newId("healthTip"),
      title: body.title,
      content: body.content,
      category: body.category,
      createdDate: new Date().toISOString(),
      relevantConditions: body.relevantConditions,
    };
    res.status(201).json(tip);
  });

  router.get("/patient/:patientId", (_req, res) => {
    res.json(patientHealthTips());
  });

  router.get("/:id", (req, res) => {
    const tip: HealthTip = { id: req.params.id, ...MANAGING_HYPERTENSION };
    res.json(tip);
  });

  return router;
};
