import { z } from "zod";
import { fromZodError } from "./errors";

export const loginSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

const registerSchema = z.object({
  name: z.string().min(1),
  email: z.string().min(1),
  password: z.string().min(1),
  role: z.string().optional(),
});

export const doctorRegisterSchema = registerSchema.extend({
  specialization: z.string().min(1),
  phoneNumber: z.string().min(1),
});

export const patientRegisterSchema = registerSchema.extend({
  age: z.number().int().nonnegative(),
  gender: z.string().min(1),
});

export const doctorUpdateSchema = z.object({
  name: z.string().optional(),
  email: z.string().optional(),
  specialization: z.string().optional(),
  phoneNumber: z.string().optional(),
});

export const patientUpdateSchema = z.object({
  name: z.string().optional(),
  email: z.string().optional(),
  age: z.number().int().nonnegative().optional(),
  gender: z.string().optional(),
});

const prescribedMedicineSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  dosage: z.string().min(1),
  timing: z.string().min(1),
  instructions: z.string().optional(),
});

export const prescriptionCreateSchema = z.object({
  patientId: z.string().min(1),
  diseaseDescription: z.string().min(1),
  medicines: z.array(prescribedMedicineSchema),
  followUpDate: z.string().nullable().optional(),
  advice: z.string().optional(),
});

// Dates stay raw strings here; the handler decides what an unparseable one means.
export const prescriptionUpdateSchema = z.object({
  patientId: z.string().optional(),
  date: z.string().nullable().optional(),
  diseaseDescription: z.string().optional(),
  medicines: z.array(prescribedMedicineSchema).optional(),
  followUpDate: z.string().nullable().optional(),
  advice: z.string().optional(),
  status: z.enum(["active", "completed"]).optional(),
});

export const healthTipCreateSchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
  category: z.string().min(1),
  relevantConditions: z.array(z.string()).default([]),
});

export const notificationUpdateSchema = z.object({
  status: z.enum(["pending", "taken", "missed"]),
  isRead: z.boolean().default(false),
});

export const followUpUpdateSchema = z.object({
  status: z.enum(["scheduled", "completed", "rescheduled", "missed"]),
  scheduledDate: z.string().optional(),
  notes: z.string().optional(),
});

/**
 * Parses a request body against a schema. A missing body is treated as an
 * empty object so that schemas with only optional fields accept it.
 */
export const parseBody = <T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> => {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
};
