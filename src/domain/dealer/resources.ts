import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

export interface ResourceEntry {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  file: string;
}

export const RESOURCES: readonly ResourceEntry[] = [
  {
    uri: "fraud://sources/search-strategy",
    name: "Estratégia de Busca",
    description: "Como o sistema busca informações sobre lojistas suspeitos",
    mimeType: "text/markdown",
    file: "search-strategy.md",
  },
  {
    uri: "fraud://sources/indicators",
    name: "Indicadores de Fraude",
    description: "Red flags para identificar lojistas fraudulentos",
    mimeType: "text/markdown",
    file: "indicators.md",
  },
  {
    uri: "fraud://guide/usage",
    name: "Guia de Uso",
    description: "Como usar o sistema para verificar lojistas",
    mimeType: "text/markdown",
    file: "usage.md",
  },
  {
    uri: "fraud://legal/disclaimer",
    name: "Aviso Legal",
    description: "Informações legais sobre o uso do sistema",
    mimeType: "text/markdown",
    file: "disclaimer.md",
  },
];

/**
 * Locate the `resources/` directory by walking up to the package root, so
 * the same lookup works from `src/` under the test runner and from `dist/`.
 */
function findResourcesDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error("Could not locate package root for resources/");
    }
    dir = parent;
  }
  return join(dir, "resources");
}

export function findResource(uri: string): ResourceEntry | undefined {
  return RESOURCES.find((r) => r.uri === uri);
}

/**
 * Read a resource's markdown.
 *
 * @throws Error for an unknown URI
 */
export async function readResource(
  uri: string,
): Promise<{ entry: ResourceEntry; text: string }> {
  const entry = findResource(uri);
  if (!entry) {
    throw new Error(`Resource not found: ${uri}`);
  }
  const text = await readFile(join(findResourcesDir(), entry.file), "utf-8");
  return { entry, text };
}
