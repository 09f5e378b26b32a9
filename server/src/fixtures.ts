import type {
  Doctor,
  FollowUp,
  HealthTip,
  MedicationSchedule,
  Notification,
  Patient,
  PrescribedMedicine,
  Prescription,
  PrescriptionSummary,
} from "./types";

export const DEMO_DOCTOR_ID = "doc-12345678";
export const DEMO_PATIENT_ID = "pat-12345678";

const DAY_MS = 24 * 60 * 60 * 1000;

export const utcDate = (year: number, month: number, day: number, hour = 0, minute = 0): string =>
  new Date(Date.UTC(year, month - 1, day, hour, minute)).toISOString();

export const daysFromNow = (days: number, now: Date = new Date()): string =>
  new Date(now.getTime() + days * DAY_MS).toISOString();

/** Today (server local time) at the given hour, on the hour. */
export const todayAt = (hour: number, now: Date = new Date()): string => {
  const at = new Date(now);
  at.setHours(hour, 0, 0, 0);
  return at.toISOString();
};

export const SARAH_WILLIAMS: Doctor = {
  id: DEMO_DOCTOR_ID,
  name: "Dr. Sarah Williams",
  email: "sarah.williams@example.com",
  specialization: "Cardiologist",
  phoneNumber: "123-456-7890",
};

export const MICHAEL_CHEN: Doctor = {
  id: "doc-87654321",
  name: "Dr. Michael Chen",
  email: "michael.chen@example.com",
  specialization: "General Practitioner",
  phoneNumber: "987-654-3210",
};

export const JOHN_SMITH: Patient = {
  id: DEMO_PATIENT_ID,
  name: "John Smith",
  email: "john.smith@example.com",
  age: 45,
  gender: "male",
};

export const EMMA_WILSON: Patient = {
  id: "pat-87654321",
  name: "Emma Wilson",
  email: "emma.wilson@example.com",
  age: 32,
  gender: "female",
};

const HYPERTENSION_SUMMARY: PrescriptionSummary = {
  id: "pres-123456",
  doctor: SARAH_WILLIAMS.name,
  specialization: SARAH_WILLIAMS.specialization,
  date: utcDate(2023, 4, 18),
  condition: "Hypertension",
  status: "active",
  medicines: ["Lisinopril 10mg", "Hydrochlorothiazide 12.5mg"],
};

const RESPIRATORY_SUMMARY: PrescriptionSummary = {
  id: "pres-789012",
  doctor: MICHAEL_CHEN.name,
  specialization: MICHAEL_CHEN.specialization,
  date: utcDate(2023, 3, 10),
  condition: "Upper Respiratory Infection",
  status: "completed",
  medicines: ["Amoxicillin 500mg", "Guaifenesin 400mg"],
};

const ARRHYTHMIA_SUMMARY: PrescriptionSummary = {
  id: "pres-456789",
  doctor: SARAH_WILLIAMS.name,
  specialization: SARAH_WILLIAMS.specialization,
  date: utcDate(2023, 3, 15),
  condition: "Cardiac Arrhythmia",
  status: "active",
  medicines: ["Metoprolol 25mg"],
};

export const userPrescriptionSummaries = (): PrescriptionSummary[] => [HYPERTENSION_SUMMARY, RESPIRATORY_SUMMARY];
export const doctorPrescriptionSummaries = (): PrescriptionSummary[] => [HYPERTENSION_SUMMARY, ARRHYTHMIA_SUMMARY];

export const DEFAULT_PRESCRIBED: PrescribedMedicine[] = [
  { id: "med-10", name: "Lisinopril 10mg", dosage: "1", timing: "morning", instructions: "Take with or without food" },
];

export const detailedPrescription = (id: string): Prescription => ({
  id,
  doctorId: DEMO_DOCTOR_ID,
  patientId: DEMO_PATIENT_ID,
  date: utcDate(2023, 4, 18),
  diseaseDescription: "Hypertension",
  medicines: [
    ...DEFAULT_PRESCRIBED,
    { id: "med-15", name: "Hydrochlorothiazide 12.5mg", dosage: "1", timing: "morning", instructions: "Take with food" },
  ],
  followUpDate: utcDate(2023, 5, 18),
  advice: "Reduce salt intake. Monitor blood pressure daily.",
  status: "active",
});

export const MANAGING_HYPERTENSION: Omit<HealthTip, "id"> = {
  title: "Managing Hypertension",
  content:
    "Regular exercise and reduced salt intake can help manage hypertension. Aim for at least 30 minutes of moderate exercise most days of the week.",
  category: "cardiovascular",
  createdDate: utcDate(2023, 4, 15),
  relevantConditions: ["hypertension", "heart disease"],
};

export const healthTips = (): HealthTip[] => [
  { id: "tip-123456", ...MANAGING_HYPERTENSION },
  {
    id: "tip-234567",
    title: "Diabetic Diet Tips",
    content:
      "Include complex carbohydrates like whole grains, fruits, and vegetables in your diet. Monitor your carbohydrate intake and try to eat at consistent times each day.",
    category: "diabetes",
    createdDate: utcDate(2023, 4, 12),
    relevantConditions: ["diabetes", "obesity"],
  },
  {
    id: "tip-345678",
    title: "Respiratory Health",
    content:
      "Avoid smoke and air pollutants. Keep indoor spaces well-ventilated and consider using an air purifier if you have asthma or allergies.",
    category: "respiratory",
    createdDate: utcDate(2023, 4, 10),
    relevantConditions: ["asthma", "COPD", "allergies"],
  },
];

export const patientHealthTips = (): HealthTip[] => [
  { id: "tip-123456", ...MANAGING_HYPERTENSION },
  {
    id: "tip-234567",
    title: "Stress Management",
    content: "Practicing mindfulness meditation for 10-15 minutes daily can help reduce stress and lower blood pressure.",
    category: "mental health",
    createdDate: utcDate(2023, 4, 16),
    relevantConditions: ["hypertension", "anxiety"],
  },
];

export const patientNotifications = (patientId: string, now: Date = new Date()): Notification[] => [
  {
    id: "notif-123456",
    patientId,
    prescriptionId: "pres-123456",
    medicineId: "med-10",
    medicineName: "Lisinopril 10mg",
    scheduledTime: todayAt(8, now),
    status: "taken",
    isRead: false,
  },
  {
    id: "notif-234567",
    patientId,
    prescriptionId: "pres-123456",
    medicineId: "med-15",
    medicineName: "Hydrochlorothiazide 12.5mg",
    scheduledTime: todayAt(8, now),
    status: "pending",
    isRead: false,
  },
  {
    id: "notif-345678",
    patientId,
    prescriptionId: "pres-123456",
    medicineId: "med-10",
    medicineName: "Lisinopril 10mg",
    scheduledTime: todayAt(20, now),
    status: "pending",
    isRead: false,
  },
];

export const medicationSchedule = (patientId: string): MedicationSchedule => ({
  patient: { id: patientId, name: JOHN_SMITH.name },
  dailySchedule: [
    {
      time: "08:00",
      medicines: [
        { medicineId: "med-10", name: "Lisinopril 10mg", instructions: "Take with water" },
        { medicineId: "med-15", name: "Hydrochlorothiazide 12.5mg", instructions: "Take with food" },
      ],
    },
    {
      time: "13:00",
      medicines: [{ medicineId: "med-12", name: "Metformin 500mg", instructions: "Take with lunch" }],
    },
    {
      time: "20:00",
      medicines: [{ medicineId: "med-10", name: "Lisinopril 10mg", instructions: "Take with water" }],
    },
  ],
});

export const BLOOD_PRESSURE_REVIEW = "Review blood pressure readings";

export const userFollowUps = (): FollowUp[] => [
  {
    id: "follow-123456",
    prescriptionId: "pres-123456",
    doctorId: DEMO_DOCTOR_ID,
    patientId: DEMO_PATIENT_ID,
    scheduledDate: utcDate(2023, 5, 18, 10, 30),
    status: "scheduled",
    notes: BLOOD_PRESSURE_REVIEW,
  },
  {
    id: "follow-234567",
    prescriptionId: "pres-789012",
    doctorId: MICHAEL_CHEN.id,
    patientId: DEMO_PATIENT_ID,
    scheduledDate: utcDate(2023, 4, 10, 9, 0),
    status: "completed",
    notes: "Follow-up for upper respiratory infection. Patient has recovered.",
  },
];

export const doctorFollowUps = (doctorId: string): FollowUp[] => [
  {
    id: "follow-123456",
    prescriptionId: "pres-123456",
    doctorId,
    patientId: DEMO_PATIENT_ID,
    scheduledDate: utcDate(2023, 5, 18, 10, 30),
    status: "scheduled",
    notes: BLOOD_PRESSURE_REVIEW,
  },
  {
    id: "follow-234567",
    prescriptionId: "pres-456789",
    doctorId,
    patientId: EMMA_WILSON.id,
    scheduledDate: utcDate(2023, 5, 20, 14, 0),
    status: "scheduled",
    notes: "Follow-up for cardiac arrhythmia",
  },
];

export const dueFollowUps = (doctorId: string, now: Date = new Date()): FollowUp[] =>
  doctorFollowUps(doctorId).map((followUp, index) => ({
    ...followUp,
    patientName: index === 0 ? JOHN_SMITH.name : EMMA_WILSON.name,
    scheduledDate: daysFromNow(index === 0 ? 2 : 5, now),
  }));

export const patientFollowUps = (patientId: string): FollowUp[] =>
  userFollowUps().map((followUp, index) => ({
    ...followUp,
    patientId,
    doctorName: index === 0 ? SARAH_WILLIAMS.name : MICHAEL_CHEN.name,
    notes: index === 0 ? BLOOD_PRESSURE_REVIEW : "Follow-up for upper respiratory infection",
  }));
