import { describe, expect, it } from "vitest";
import { createDispatcher, hasClientCertificate } from "../fetch";

const BASE = { ignoreHttpsErrors: false, connectTimeoutMs: 1_000 };

describe("createDispatcher", () => {
  it("builds an agent without client certificates", async () => {
    const agent = createDispatcher({ ...BASE, clientCertificate: {} });
    await agent.close();
  });

  it("requires a passphrase for a PKCS#12 bundle", () => {
    expect(() => createDispatcher({ ...BASE, clientCertificate: { pfxPath: "client.p12" } })).toThrow(
      "A passphrase is required when a PKCS#12 client certificate is configured",
    );
  });

  it("fails on certificate files that do not exist", () => {
    expect(() =>
      createDispatcher({ ...BASE, clientCertificate: { caPath: "/nonexistent/ca-bundle.pem" } }),
    ).toThrow("Certificate file not found: /nonexistent/ca-bundle.pem");
  });
});

describe("hasClientCertificate", () => {
  it("needs a bundle or a certificate and key pair", () => {
    expect(hasClientCertificate({ pfxPath: "client.p12", passphrase: "test-secret" })).toBe(true);
    expect(hasClientCertificate({ certPath: "client.pem", keyPath: "client.key" })).toBe(true);
    expect(hasClientCertificate({ certPath: "client.pem" })).toBe(false);
  });
});
