import { Router } from "express";
import { requireIdentity } from "../auth";
import { EMMA_WILSON, JOHN_SMITH } from "../fixtures";
import type { Patient } from "../types";
import { parseBody, patientUpdateSchema } from "../validation";

export const patientsRouter = (): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json([JOHN_SMITH, EMMA_WILSON]);
  });

  router.get("/:id", (req, res) => {
    const patient: Patient = { ...JOHN_SMITH, id: req.params.id };
    res.json(patient);
  });

  router.put("/:id", requireIdentity, (req, res) => {
    const update = parseBody(patientUpdateSchema, req.body);
    const patient: Patient = {
      id: req.params.id,
      name: update.name ?? JOHN_SMITH.name,
      email: update.email ?? JOHN_SMITH.email,
      age: update.age ?? JOHN_SMITH.age,
      gender: update.gender ?? JOHN_SMITH.gender,
    };
    res.json(patient);
  });

  router.delete("/:id", requireIdentity, (_req, res) => {
    res.status(204).send();
  });

  return router;
};
