import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import Handlebars from "handlebars";
import { HTTPException } from "hono/http-exception";
import { ReloadError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { templateGeneration } from "./metrics.js";
import { SnapshotCell } from "./snapshot-cell.js";

/**
 * Template layer -- loads and compiles templates from a list of
 * directories and keeps the compiled set hot-swappable.
 *
 * Provides:
 *   - TemplateRegistry.load(): initial compile at startup.
 *   - reload(): recompile everything and swap the live snapshot.
 *   - current(): the live TemplateSnapshot for a request to render with.
 *
 * Each snapshot owns its own Handlebars environment, so helpers and
 * partials registered for one generation never leak into another.
 */

/** File extensions picked up as templates. */
export const TEMPLATE_EXTENSIONS: ReadonlySet<string> = new Set([".html", ".txt", ".hbs"]);

export interface TemplateSnapshot {
  readonly generation: number;
  readonly loadedAt: Date;
  /** Template names (paths relative to their directory, forward slashes). */
  readonly names: readonly string[];
  has(name: string): boolean;
  render(name: string, data?: unknown): string;
}

/** Source of the roots to watch and the reload action. */
export interface TemplateProvider {
  watchRoots(): Promise<readonly string[]>;
  reload(): Promise<void>;
}

interface TemplateSource {
  name: string;
  file: string;
  source: string;
}

// =============================================================================
// Discovery
// =============================================================================

function toTemplateName(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/** Partial name for a template: its name without the extension. */
export function partialName(name: string): string {
  const ext = path.posix.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

async function discover(root: string): Promise<TemplateSource[]> {
  let entries: string[];
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new ReloadError(`Template path is not a directory: ${root}`, { file: root });
    }
    entries = await readdir(root, { recursive: true });
  } catch (err) {
    if (err instanceof ReloadError) throw err;
    throw new ReloadError(`Could not read template directory ${root}: ${errorMessage(err)}`, {
      cause: err,
      file: root,
    });
  }

  const sources: TemplateSource[] = [];
  for (const entry of entries.sort()) {
    if (!TEMPLATE_EXTENSIONS.has(path.extname(entry).toLowerCase())) continue;

    const file = path.join(root, entry);
    try {
      if (!(await stat(file)).isFile()) continue;
      sources.push({ name: toTemplateName(entry), file, source: await readFile(file, "utf8") });
    } catch (err) {
      throw new ReloadError(`Could not read template ${file}: ${errorMessage(err)}`, {
        cause: err,
        file,
      });
    }
  }
  return sources;
}

// =============================================================================
// Compilation
// =============================================================================

/**
 * Compile a full set of templates into a new snapshot. Later roots override
 * earlier ones by template name. Throws ReloadError on the first template
 * that fails to parse or whose partial name is already taken; nothing
 * partial is ever returned.
 */
export async function compileSnapshot(
  roots: readonly string[],
  generation: number,
): Promise<TemplateSnapshot> {
  const byName = new Map<string, TemplateSource>();
  for (const root of roots) {
    for (const source of await discover(root)) {
      byName.set(source.name, source);
    }
  }

  const env = Handlebars.create();
  const compiled = new Map<string, Handlebars.TemplateDelegate>();
  const partialOwners = new Map<string, string>();

  for (const { name, file, source } of byName.values()) {
    const partial = partialName(name);
    const owner = partialOwners.get(partial);
    if (owner !== undefined) {
      throw new ReloadError(
        `Templates ${owner} and ${name} both define the partial "${partial}"`,
        { file },
      );
    }
    partialOwners.set(partial, name);

    try {
      // compile() is lazy; parse() surfaces syntax errors now.
      env.parse(source);
      compiled.set(name, env.compile(source, { strict: true }));
      env.registerPartial(partial, source);
    } catch (err) {
      throw new ReloadError(`Could not compile template ${name}: ${errorMessage(err)}`, {
        cause: err,
        file,
      });
    }
  }

  const names = Object.freeze([...compiled.keys()].sort());
  const loadedAt = new Date();

  return Object.freeze({
    generation,
    loadedAt,
    names,
    has: (name: string) => compiled.has(name),
    render: (name: string, data: unknown = {}) => {
      const template = compiled.get(name);
      if (!template) {
        throw new HTTPException(500, { message: `Template not found: ${name}` });
      }
      return template(data);
    },
  });
}

// =============================================================================
// Registry
// =============================================================================

export class TemplateRegistry implements TemplateProvider {
  readonly #roots: readonly string[];
  readonly #cell: SnapshotCell<TemplateSnapshot>;
  #queue: Promise<void> = Promise.resolve();

  private constructor(roots: readonly string[], initial: TemplateSnapshot) {
    this.#roots = Object.freeze([...roots]);
    this.#cell = new SnapshotCell(initial);
    templateGeneration.set({}, initial.generation);
    this.#cell.onReplace((next) => {
      templateGeneration.set({}, next.value.generation);
    });
  }

  /** Load and compile the templates. Throws ReloadError if any fail. */
  static async load(roots: readonly string[]): Promise<TemplateRegistry> {
    const initial = await compileSnapshot(roots, 1);
    logger.info("Templates loaded", {
      generation: initial.generation,
      count: initial.names.length,
      roots,
    });
    return new TemplateRegistry(roots, initial);
  }

  current(): TemplateSnapshot {
    return this.#cell.current();
  }

  get generation(): number {
    return this.#cell.generation;
  }

  async watchRoots(): Promise<readonly string[]> {
    return this.#roots;
  }

  /**
   * Recompile every template and swap the live snapshot. Concurrent calls
   * are queued so two compilations never race. On failure the previous
   * snapshot stays live and the ReloadError is rethrown.
   */
  reload(): Promise<void> {
    const run = this.#queue.then(async () => {
      const next = await compileSnapshot(this.#roots, this.#cell.generation + 1);
      this.#cell.replace(next);
      logger.info("Templates reloaded", { generation: next.generation, count: next.names.length });
    });
    // Keep the queue alive after a failed reload.
    this.#queue = run.catch(() => undefined);
    return run;
  }
}
