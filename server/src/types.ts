export type Role = "doctor" | "patient";

export type User = {
  id: string;
  email: string;
  name: string;
  role: Role;
  specialization?: string;
  phoneNumber?: string;
  age?: number;
  gender?: string;
};

export type TokenResponse = {
  access_token: string;
  token_type: "Bearer";
  user: User;
};

export type Doctor = {
  id: string;
  name: string;
  email: string;
  specialization: string;
  phoneNumber: string;
};

export type Patient = {
  id: string;
  name: string;
  email: string;
  age: number;
  gender: string;
};

export type MedicineRecord = {
  id: string;
  name: string;
  group?: string;
  company?: string;
  description?: string;
};

export type MedicineEntry = Pick<MedicineRecord, "id" | "name">;

export type PrescribedMedicine = {
  id?: string;
  name: string;
  dosage: string;
  timing: string;
  instructions?: string;
};

export type PrescriptionStatus = "active" | "completed";

export type Prescription = {
  id: string;
  doctorId: string;
  patientId: string;
  date: string;
  diseaseDescription: string;
  medicines: PrescribedMedicine[];
  followUpDate: string | null;
  advice: string;
  status: PrescriptionStatus;
};

export type PrescriptionSummary = {
  id: string;
  doctor: string;
  specialization: string;
  date: string;
  condition: string;
  status: PrescriptionStatus;
  medicines: string[];
};

export type HealthTip = {
  id: string;
  title: string;
  content: string;
  category: string;
  createdDate: string;
  relevantConditions: string[];
};

export type NotificationStatus = "pending" | "taken" | "missed";

export type Notification = {
  id: string;
  patientId: string;
  prescriptionId: string;
  medicineId: string;
  medicineName: string;
  scheduledTime: string;
  status: NotificationStatus;
  isRead: boolean;
};

export type ScheduledDose = {
  medicineId: string;
  name: string;
  instructions: string;
};

export type MedicationSchedule = {
  patient: { id: string; name: string };
  dailySchedule: { time: string; medicines: ScheduledDose[] }[];
};

export type FollowUpStatus = "scheduled" | "completed" | "rescheduled" | "missed";

export type FollowUp = {
  id: string;
  prescriptionId: string;
  doctorId: string;
  patientId: string;
  scheduledDate: string;
  status: FollowUpStatus;
  notes: string;
  patientName?: string;
  doctorName?: string;
};
