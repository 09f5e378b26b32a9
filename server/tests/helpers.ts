import type { Server } from "http";
import { createApp } from "../src/app";
import type { AppConfig } from "../src/config";

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  port: 0,
  nodeEnv: "test",
  jwtSecret: "test-secret",
  jwtExpiresIn: "1h",
  allowAnonymous: true,
  logLevel: "error",
  corsOrigin: "*",
  ...overrides,
});

export type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

export const startServer = (config: AppConfig = testConfig()): Promise<TestServer> =>
  new Promise((resolve, reject) => {
    const server: Server = createApp(config).listen(0, "127.0.0.1");
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Test server is not listening on a TCP port"));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
