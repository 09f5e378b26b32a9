import { SignJWT } from "jose";
import { describe, expect, it } from "vitest";
import { issueToken, resolveIdentity } from "../src/auth";
import type { User } from "../src/types";

const SECRET = "test-secret";
const config = { jwtSecret: SECRET, jwtExpiresIn: "1h" };
const doctor: User = { id: "usr-0123456789ab", email: "doctor@example.com", name: "Dr. Sarah Williams", role: "doctor" };

describe("resolveIdentity", () => {
  it("authenticates a token it issued", async () => {
    const token = await issueToken(doctor, config);
    await expect(resolveIdentity(`Bearer ${token}`, SECRET)).resolves.toEqual({
      status: "authenticated",
      identity: { userId: "usr-0123456789ab", role: "doctor" },
    });
  });

  it("matches the scheme name case-insensitively", async () => {
    const token = await issueToken(doctor, config);
    for (const scheme of ["bearer", "BEARER"]) {
      await expect(resolveIdentity(`${scheme} ${token}`, SECRET)).resolves.toEqual({
        status: "authenticated",
        identity: { userId: "usr-0123456789ab", role: "doctor" },
      });
    }
  });

  it("treats a missing header as anonymous", async () => {
    await expect(resolveIdentity(undefined, SECRET)).resolves.toEqual({ status: "anonymous", reason: "missing" });
  });

  it("rejects schemes other than Bearer", async () => {
    await expect(resolveIdentity("Basic dXNlcjpwYXNz", SECRET)).resolves.toEqual({
      status: "anonymous",
      reason: "invalid",
    });
  });

  it("rejects an empty bearer token", async () => {
    await expect(resolveIdentity("Bearer   ", SECRET)).resolves.toEqual({ status: "anonymous", reason: "invalid" });
  });

  it("rejects a tampered token", async () => {
    const token = await issueToken(doctor, config);
    await expect(resolveIdentity(`Bearer ${token}x`, SECRET)).resolves.toEqual({
      status: "anonymous",
      reason: "invalid",
    });
  });

  it("rejects a token signed with another secret", async () => {
    const token = await issueToken(doctor, { ...config, jwtSecret: "other-secret" });
    await expect(resolveIdentity(`Bearer ${token}`, SECRET)).resolves.toEqual({
      status: "anonymous",
      reason: "invalid",
    });
  });

  it("rejects an expired token", async () => {
    const token = await new SignJWT({ role: "patient" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("usr-expired00000")
      .setIssuedAt(Math.floor(Date.now() / 1000) - 7200)
      .setExpirationTime(Math.floor(Date.now() / 1000) - 3600)
      .sign(Buffer.from(SECRET, "utf8"));
    await expect(resolveIdentity(`Bearer ${token}`, SECRET)).resolves.toEqual({
      status: "anonymous",
      reason: "invalid",
    });
  });

  it("drops a role claim it does not recognise", async () => {
    const token = await new SignJWT({ role: "admin" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("usr-admin0000000")
      .setExpirationTime("1h")
      .sign(Buffer.from(SECRET, "utf8"));
    await expect(resolveIdentity(`Bearer ${token}`, SECRET)).resolves.toEqual({
      status: "authenticated",
      identity: { userId: "usr-admin0000000", role: undefined },
    });
  });

  it("rejects a token without a subject", async () => {
    const token = await new SignJWT({ role: "doctor" })
      .setProtectedHeader({ alg: "HS256" })
      .setExpirationTime("1h")
      .sign(Buffer.from(SECRET, "utf8"));
    await expect(resolveIdentity(`Bearer ${token}`, SECRET)).resolves.toEqual({
      status: "anonymous",
      reason: "invalid",
    });
  });
});
