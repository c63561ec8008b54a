import admin from "firebase-admin";
import fs from "node:fs";
import { z } from "zod";
import type { Firestore } from "firebase-admin/firestore";
import type { AppConfig } from "./config.js";

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

function resolveCredential(config: AppConfig): admin.credential.Credential | null {
  if (config.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const json = serviceAccountSchema.parse(JSON.parse(config.FIREBASE_SERVICE_ACCOUNT_JSON));
    return admin.credential.cert({
      projectId: json.project_id,
      clientEmail: json.client_email,
      privateKey: json.private_key,
    });
  }

  if (config.GOOGLE_APPLICATION_CREDENTIALS) {
    const p = config.GOOGLE_APPLICATION_CREDENTIALS;
    if (!fs.existsSync(p)) {
      throw new Error(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    return admin.credential.cert(p);
  }

  return null;
}

/** Firestore handle, or null when no Firebase credentials are configured. */
export function initializeFirestore(config: AppConfig): Firestore | null {
  if (admin.apps.length) {
    return admin.firestore(admin.app());
  }

  const credential = resolveCredential(config);
  if (!credential) {
    // No Firebase configured; allow fallback to filesystem
    return null;
  }

  const app = admin.initializeApp({ credential });
  return admin.firestore(app);
}
