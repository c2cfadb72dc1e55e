import { cert, getApps, initializeApp, type App, type AppOptions } from "firebase-admin/app";
import { getAuth, type Auth } from "firebase-admin/auth";
import { getFirestore, type Firestore } from "firebase-admin/firestore";
import { z } from "zod";

import { ConfigurationError, errorMessage } from "@/lib/errors";

let cachedApp: App | undefined;

const serviceAccountSchema = z.object({
  project_id: z.string().optional(),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

function isProductionEnv(): boolean {
  return process.env.NODE_ENV === "production";
}

function fromServiceAccountKey(raw: string, projectId: string | undefined): AppOptions | undefined {
  try {
    const parsed = serviceAccountSchema.parse(JSON.parse(raw));
    return {
      credential: cert({
        projectId: parsed.project_id ?? projectId,
        clientEmail: parsed.client_email,
        privateKey: parsed.private_key,
      }),
    };
  } catch (error) {
    if (isProductionEnv()) {
      throw new ConfigurationError(`Invalid FIREBASE_SERVICE_ACCOUNT_KEY configuration: ${errorMessage(error)}`);
    }

    console.warn("[firebase-admin] FIREBASE_SERVICE_ACCOUNT_KEY is invalid, falling back", {
      message: errorMessage(error),
    });
    return undefined;
  }
}

/**
 * Credential order: FIREBASE_SERVICE_ACCOUNT_KEY (JSON), then the split
 * FIREBASE_PRIVATE_KEY / FIREBASE_CLIENT_EMAIL / FIREBASE_PROJECT_ID vars,
 * then application default credentials.
 */
function resolveAppOptions(): AppOptions {
  const projectId = process.env.FIREBASE_PROJECT_ID || undefined;
  const serviceAccountKey = process.env.FIREBASE_SERVICE_ACCOUNT_KEY;

  if (serviceAccountKey) {
    const options = fromServiceAccountKey(serviceAccountKey, projectId);
    if (options) {
      return options;
    }
  }

  const privateKey = process.env.FIREBASE_PRIVATE_KEY;
  const clientEmail = process.env.FIREBASE_CLIENT_EMAIL;

  if (privateKey && clientEmail && projectId) {
    return {
      credential: cert({ projectId, clientEmail, privateKey: privateKey.replace(/\\n/g, "\n") }),
    };
  }

  if (isProductionEnv() && (privateKey || clientEmail)) {
    throw new ConfigurationError(
      "Incomplete Firebase Admin credential env vars: FIREBASE_PRIVATE_KEY, FIREBASE_CLIENT_EMAIL, and FIREBASE_PROJECT_ID are all required",
    );
  }

  return { projectId };
}

function getAdminApp(): App {
  if (cachedApp) {
    return cachedApp;
  }

  const [existing] = getApps();
  cachedApp = existing ?? initializeApp(resolveAppOptions());
  return cachedApp;
}

export function getAdminFirestore(): Firestore {
  return getFirestore(getAdminApp());
}

export function getAdminAuth(): Auth {
  return getAuth(getAdminApp());
}
