import { Router } from "express";
import { requireIdentity } from "../auth";
import { EMMA_WILSON, JOHN_SMITH, MICHAEL_CHEN, SARAH_WILLIAMS } from "../fixtures";
import { newId } from "../ids";
import type { Doctor, Patient } from "../types";
import { doctorUpdateSchema, parseBody } from "../validation";

export const doctorsRouter = (): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json([SARAH_WILLIAMS, MICHAEL_CHEN]);
  });

  router.get("/:id", (req, res) => {
    const doctor: Doctor = { ...SARAH_WILLIAMS, id: req.params.id };
    res.json(doctor);
  });

  router.put("/:id", requireIdentity, (req, res) => {
    const update = parseBody(doctorUpdateSchema, req.body);
    const doctor: Doctor = {
      id: req.params.id,
      name: update.name ?? SARAH_WILLIAMS.name,
      email: update.email ?? SARAH_WILLIAMS.email,
      specialization: update.specialization ?? SARAH_WILLIAMS.specialization,
      phoneNumber: update.phoneNumber ?? SARAH_WILLIAMS.phoneNumber,
    };
    res.json(doctor);
  });

  router.delete("/:id", requireIdentity, (_req, res) => {
    res.status(204).send();
  });

  router.get("/:id/patients", requireIdentity, (_req, res) => {
    const patients: Patient[] = [JOHN_SMITH, EMMA_WILSON].map((patient) => ({ ...patient, id: newId("patient") }));
    res.json(patients);
  });

  return router;
};
