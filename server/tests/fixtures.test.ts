import { describe, expect, it } from "vitest";
import { getCatalog } from "../src/catalog";
import {
  DEFAULT_PRESCRIBED,
  detailedPrescription,
  dueFollowUps,
  medicationSchedule,
  patientNotifications,
  todayAt,
} from "../src/fixtures";
import { resolveUpdateDates } from "../src/routes/prescriptions";

const NOW = new Date("2024-01-01T00:00:00.000Z");

describe("resolveUpdateDates", () => {
  it("keeps parseable dates", () => {
    expect(resolveUpdateDates("2023-04-18T10:30:00.000Z", "2023-05-18T10:30:00.000Z", NOW)).toEqual({
      date: "2023-04-18T10:30:00.000Z",
      followUpDate: "2023-05-18T10:30:00.000Z",
    });
  });

  it("uses now for an unparseable or missing prescription date", () => {
    expect(resolveUpdateDates("yesterday-ish", undefined, NOW).date).toBe("2024-01-01T00:00:00.000Z");
    expect(resolveUpdateDates(undefined, undefined, NOW).date).toBe("2024-01-01T00:00:00.000Z");
  });

  it("moves an unparseable follow-up date thirty days out", () => {
    expect(resolveUpdateDates(undefined, "soon", NOW).followUpDate).toBe("2024-01-31T00:00:00.000Z");
  });

  it("leaves an absent follow-up date empty", () => {
    expect(resolveUpdateDates(undefined, null, NOW).followUpDate).toBeNull();
    expect(resolveUpdateDates(undefined, "", NOW).followUpDate).toBeNull();
  });
});

describe("fabricated schedules", () => {
  it("schedules reminders for today", () => {
    const reminders = patientNotifications("pat-42", NOW);
    expect(reminders.map((reminder) => reminder.scheduledTime)).toEqual([
      todayAt(8, NOW),
      todayAt(8, NOW),
      todayAt(20, NOW),
    ]);
    expect(reminders.every((reminder) => reminder.patientId === "pat-42")).toBe(true);
  });

  it("places due follow-ups inside the next week", () => {
    const due = dueFollowUps("doc-42", NOW);
    expect(due.map((followUp) => followUp.scheduledDate)).toEqual([
      "2024-01-03T00:00:00.000Z",
      "2024-01-06T00:00:00.000Z",
    ]);
    expect(due.map((followUp) => followUp.patientName)).toEqual(["John Smith", "Emma Wilson"]);
    expect(due.every((followUp) => followUp.doctorId === "doc-42")).toBe(true);
  });
});

describe("medicine references", () => {
  const catalog = getCatalog();

  const references = [
    ...DEFAULT_PRESCRIBED.map(({ id, name }) => ({ id, name })),
    ...detailedPrescription("pres-1").medicines.map(({ id, name }) => ({ id, name })),
    ...patientNotifications("pat-1", NOW).map(({ medicineId, medicineName }) => ({ id: medicineId, name: medicineName })),
    ...medicationSchedule("pat-1").dailySchedule.flatMap((slot) =>
      slot.medicines.map(({ medicineId, name }) => ({ id: medicineId, name })),
    ),
  ];

  it("point at the catalog record of the same name", () => {
    expect(references.length).toBeGreaterThan(0);
    for (const { id, name } of references) {
      expect(catalog.findById(id)?.name, id).toBe(name);
    }
  });
});
