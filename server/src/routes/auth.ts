import { Router } from "express";
import { tokenResponse } from "../auth";
import type { AppConfig } from "../config";
import { asyncHandler } from "../errors";
import { JOHN_SMITH, SARAH_WILLIAMS } from "../fixtures";
import { newId } from "../ids";
import type { User } from "../types";
import { doctorRegisterSchema, loginSchema, parseBody, patientRegisterSchema } from "../validation";

// No credential store exists: the login identity is derived from the email alone.
export const userForEmail = (email: string): User =>
  email.includes("doctor")
    ? { id: newId("user"), email, name: SARAH_WILLIAMS.name, role: "doctor" }
    : { id: newId("user"), email, name: JOHN_SMITH.name, role: "patient" };

export const authRouter = (config: AppConfig): Router => {
  const router = Router();

  router.post(
    "/login",
    asyncHandler(async (req, res) => {
      const { email } = parseBody(loginSchema, req.body);
      res.json(await tokenResponse(userForEmail(email), config));
    }),
  );

  router.post(
    "/register/doctor",
    asyncHandler(async (req, res) => {
      const { name, email, specialization, phoneNumber } = parseBody(doctorRegisterSchema, req.body);
      const user: User = { id: newId("user"), email, name, role: "doctor", specialization, phoneNumber };
      res.status(201).json(await tokenResponse(user, config));
    }),
  );

  router.post(
    "/register/patient",
    asyncHandler(async (req, res) => {
      const { name, email, age, gender } = parseBody(patientRegisterSchema, req.body);
      const user: User = { id: newId("user"), email, name, role: "patient", age, gender };
      res.status(201).json(await tokenResponse(user, config));
    }),
  );

  return router;
};
