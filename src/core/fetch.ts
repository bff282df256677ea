import fs from "node:fs";
import { Agent } from "undici";
import type { ClientCertificateConfig } from "../config/types";

export interface DispatcherOptions {
  ignoreHttpsErrors: boolean;
  connectTimeoutMs: number;
  clientCertificate: ClientCertificateConfig;
}

const MAX_REDIRECTIONS = 10;

function readOptionalFile(filePath: string | undefined): Buffer | undefined {
  if (!filePath) {
    return undefined;
  }
  if (!fs.existsSync(filePath)) {
    throw new Error(`Certificate file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath);
}

export function hasClientCertificate(cert: ClientCertificateConfig): boolean {
  return Boolean(cert.pfxPath) || (Boolean(cert.certPath) && Boolean(cert.keyPath));
}

export function createDispatcher(options: DispatcherOptions): Agent {
  const { clientCertificate } = options;
  if (clientCertificate.pfxPath && !clientCertificate.passphrase) {
    throw new Error("A passphrase is required when a PKCS#12 client certificate is configured");
  }

  const pfx = readOptionalFile(clientCertificate.pfxPath);
  const cert = pfx ? undefined : readOptionalFile(clientCertificate.certPath);
  const key = pfx ? undefined : readOptionalFile(clientCertificate.keyPath);
  const ca = readOptionalFile(clientCertificate.caPath);

  return new Agent({
    maxRedirections: MAX_REDIRECTIONS,
    connect: {
      timeout: options.connectTimeoutMs,
      rejectUnauthorized: !options.ignoreHttpsErrors,
      ...(pfx ? { pfx, passphrase: clientCertificate.passphrase } : {}),
      ...(cert && key ? { cert, key, passphrase: clientCertificate.passphrase } : {}),
      ...(ca ? { ca } : {}),
    },
  });
}
