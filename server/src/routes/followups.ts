import { Router } from "express";
import {
  BLOOD_PRESSURE_REVIEW,
  DEMO_DOCTOR_ID,
  DEMO_PATIENT_ID,
  doctorFollowUps,
  dueFollowUps,
  patientFollowUps,
  userFollowUps,
  utcDate,
} from "../fixtures";
import type { FollowUp } from "../types";
import { followUpUpdateSchema, parseBody } from "../validation";

export const followUpsRouter = (): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(userFollowUps());
  });

  router.get("/doctor/:doctorId", (req, res) => {
    res.json(doctorFollowUps(req.params.doctorId));
  });

  // Due means scheduled within the next seven days.
  router.get("/doctor/:doctorId/due", (req, res) => {
    res.json(dueFollowUps(req.params.doctorId));
  });

  router.get("/patient/:patientId", (req, res) => {
    res.json(patientFollowUps(req.params.patientId));
  });

  router.put("/:id/update", (req, res) => {
    const body = parseBody(followUpUpdateSchema, req.body);
    const followUp: FollowUp = {
      id: req.params.id,
      prescriptionId: "pres-123456",
      doctorId: DEMO_DOCTOR_ID,
      patientId: DEMO_PATIENT_ID,
      scheduledDate: body.scheduledDate ?? utcDate(2023, 5, 18, 10, 30),
      status: body.status,
      notes: body.notes ?? BLOOD_PRESSURE_REVIEW,
    };
    res.json(followUp);
  });

  return router;
};
