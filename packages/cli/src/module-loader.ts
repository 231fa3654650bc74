import { pathToFileURL } from "node:url";
import { isRecord } from "@parley/core";

const MAX_UNWRAP_DEPTH = 8;

/** Peel `{ default: ... }` wrappers left by CommonJS interop. */
export function unwrapModuleDefault(value: unknown): unknown {
  let current = value;

  for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth += 1) {
    if (!isRecord(current) || !("default" in current)) {
      break;
    }

    const keys = Object.keys(current);
    const defaultOnly = keys.length === 1;
    const defaultWithEsModule = keys.length === 2 && keys.includes("__esModule");
    if (!defaultOnly && !defaultWithEsModule) {
      break;
    }

    const next = current.default;
    if (next === undefined || next === current) {
      break;
    }
    current = next;
  }

  return current;
}

export async function importTypeScriptModule(filePath: string): Promise<unknown> {
  const { tsImport } = await import("tsx/esm/api");
  const moduleUrl = pathToFileURL(filePath).href;
  const loaded: unknown = await tsImport(moduleUrl, {
    parentURL: moduleUrl
  });
  return loaded;
}

export async function importConfigModule(filePath: string): Promise<unknown> {
  if (filePath.endsWith(".ts") || filePath.endsWith(".mts")) {
    return await importTypeScriptModule(filePath);
  }
  const loaded: unknown = await import(pathToFileURL(filePath).href);
  return loaded;
}
