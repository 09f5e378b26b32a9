import { Router } from "express";
import { medicationSchedule, patientNotifications, todayAt } from "../fixtures";
import type { Notification } from "../types";
import { notificationUpdateSchema, parseBody } from "../validation";

export const notificationsRouter = (): Router => {
  const router = Router();

  router.get("/patient/:patientId", (req, res) => {
    res.json(patientNotifications(req.params.patientId));
  });

  router.put("/:id/update", (req, res) => {
    const { status, isRead } = parseBody(notificationUpdateSchema, req.body);
    const notification: Notification = {
      id: req.params.id,
      patientId: "pat-123456",
      prescriptionId: "pres-123456",
      medicineId: "med-10",
      medicineName: "Lisinopril 10mg",
      scheduledTime: todayAt(8),
      status,
      isRead,
    };
    res.json(notification);
  });

  router.get("/schedule/patient/:patientId", (req, res) => {
    res.json(medicationSchedule(req.params.patientId));
  });

  return router;
};
