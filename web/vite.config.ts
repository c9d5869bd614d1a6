import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ServerOptions as HttpsServerOptions } from 'node:https';

import react from '@vitejs/plugin-react';
import { defineConfig, loadEnv } from 'vite';

const webDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig(({ mode }) => {
  // Load env vars from the same dir as this config file
  const env = loadEnv(mode, webDir, '');
  const httpsOptions = resolveHttpsOptions(env);

  return {
    root: webDir,
    envDir: webDir,
    base: './',

    plugins: [react()],

    build: {
      outDir: path.resolve(webDir, '..', 'dist'),
      emptyOutDir: true
    },

    server: {
      host: true,
      https: httpsOptions
    },

    preview: {
      host: true,
      https: httpsOptions
    }
  };
});

function resolveHttpsOptions(env: Record<string, string>): HttpsServerOptions | undefined {
  const explicit = parseBooleanFlag(env.VITE_DEV_HTTPS);
  const certPath = env.VITE_DEV_HTTPS_CERT;
  const keyPath = env.VITE_DEV_HTTPS_KEY;

  const shouldEnable = explicit ?? Boolean(certPath && keyPath);
  if (!shouldEnable || !certPath || !keyPath) {
    return undefined;
  }

  return {
    cert: fs.readFileSync(resolveFilePath(certPath, 'VITE_DEV_HTTPS_CERT')),
    key: fs.readFileSync(resolveFilePath(keyPath, 'VITE_DEV_HTTPS_KEY'))
  };
}

function parseBooleanFlag(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const val = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(val)) return true;
  if (['0', 'false', 'no', 'off'].includes(val)) return false;
  throw new Error(`Invalid boolean '${value}'`);
}

function resolveFilePath(target: string, envKey: string): string {
  const resolved = path.resolve(target);
  if (!fs.existsSync(resolved)) {
    throw new Error(`${envKey} -> file does not exist: ${resolved}`);
  }
  return resolved;
}
