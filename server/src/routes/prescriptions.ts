import { Router } from "express";
import { actingUserId } from "../auth";
import {
  DEFAULT_PRESCRIBED,
  DEMO_DOCTOR_ID,
  DEMO_PATIENT_ID,
  daysFromNow,
  detailedPrescription,
  doctorPrescriptionSummaries,
  userPrescriptionSummaries,
} from "../fixtures";
import { newId } from "../ids";
import type { Prescription } from "../types";
import { parseBody, prescriptionCreateSchema, prescriptionUpdateSchema } from "../validation";

const FOLLOW_UP_FALLBACK_DAYS = 30;

const parseDate = (value: string | null | undefined): Date | undefined => {
  if (!value) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

/**
 * Update-time date rules: an unparseable prescription date becomes now, an
 * unparseable follow-up date becomes now + 30 days, an absent one becomes null.
 */
export const resolveUpdateDates = (
  date: string | null | undefined,
  followUpDate: string | null | undefined,
  now: Date = new Date(),
): { date: string; followUpDate: string | null } => ({
  date: (parseDate(date) ?? now).toISOString(),
  followUpDate: !followUpDate
    ? null
    : (parseDate(followUpDate)?.toISOString() ?? daysFromNow(FOLLOW_UP_FALLBACK_DAYS, now)),
});

export const prescriptionsRouter = (): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(userPrescriptionSummaries());
  });

  router.post("/", (req, res) => {
    const body = parseBody(prescriptionCreateSchema, req.body);
    const prescription: Prescription = {
      id: newId("prescription"),
      doctorId: actingUserId(req, DEMO_DOCTOR_ID),
      patientId: body.patientId,
      date: new Date().toISOString(),
      diseaseDescription: body.diseaseDescription,
      medicines: body.medicines,
      followUpDate: body.followUpDate ?? null,
      advice: body.advice ?? "",
      status: "active",
    };
    res.status(201).json(prescription);
  });

  router.get("/doctor/:doctorId", (_req, res) => {
    res.json(doctorPrescriptionSummaries());
  });

  router.get("/patient/:patientId", (_req, res) => {
    res.json(userPrescriptionSummaries());
  });

  router.get("/:id", (req, res) => {
    res.json(detailedPrescription(req.params.id));
  });

  router.put("/:id", (req, res) => {
    const body = parseBody(prescriptionUpdateSchema, req.body);
    const prescription: Prescription = {
      id: req.params.id,
      doctorId: actingUserId(req, DEMO_DOCTOR_ID),
      patientId: body.patientId ?? DEMO_PATIENT_ID,
      ...resolveUpdateDates(body.date, body.followUpDate),
      diseaseDescription: body.diseaseDescription ?? "Hypertension",
      medicines: body.medicines ?? DEFAULT_PRESCRIBED,
      advice: body.advice ?? "",
      status: body.status ?? "active",
    };
    res.json(prescription);
  });

  return router;
};
