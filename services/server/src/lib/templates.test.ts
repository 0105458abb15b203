import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { HTTPException } from "hono/http-exception";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReloadError } from "./errors.js";
import { templateGeneration } from "./metrics.js";
import { TemplateRegistry, compileSnapshot, partialName } from "./templates.js";

let base: string;

async function write(root: string, name: string, source: string): Promise<void> {
  const file = path.join(root, name);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, source);
}

beforeEach(async () => {
  base = await mkdtemp(path.join(tmpdir(), "templates-"));
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(base, { recursive: true, force: true });
});

describe("partialName", () => {
  it("drops the extension", () => {
    expect(partialName("layout.html")).toBe("layout");
    expect(partialName("emails/welcome.txt")).toBe("emails/welcome");
    expect(partialName("README")).toBe("README");
  });
});

describe("compileSnapshot", () => {
  it("compiles every template under the roots", async () => {
    const root = path.join(base, "a");
    await write(root, "index.html", "<h1>{{title}}</h1>");
    await write(root, "emails/welcome.txt", "Hi {{name}}");
    await write(root, "notes.md", "# not a template");

    const snapshot = await compileSnapshot([root], 1);

    expect(snapshot.generation).toBe(1);
    expect(snapshot.names).toEqual(["emails/welcome.txt", "index.html"]);
    expect(snapshot.has("notes.md")).toBe(false);
    expect(snapshot.render("index.html", { title: "Home" })).toBe("<h1>Home</h1>");
    expect(snapshot.render("emails/welcome.txt", { name: "Ada" })).toBe("Hi Ada");
  });

  it("lets later roots override earlier ones by name", async () => {
    const first = path.join(base, "a");
    const second = path.join(base, "b");
    await write(first, "layout.html", "A");
    await write(first, "only-a.html", "only A");
    await write(second, "layout.html", "B");

    const snapshot = await compileSnapshot([first, second], 1);

    expect(snapshot.render("layout.html")).toBe("B");
    expect(snapshot.render("only-a.html")).toBe("only A");
  });

  it("registers templates as partials", async () => {
    const root = path.join(base, "a");
    await write(root, "header.html", "<header>{{site}}</header>");
    await write(root, "page.html", "{{> header}}<main>body</main>");

    const snapshot = await compileSnapshot([root], 1);

    expect(snapshot.render("page.html", { site: "Docs" })).toBe(
      "<header>Docs</header><main>body</main>",
    );
  });

  it("rejects two templates that map to the same partial", async () => {
    const root = path.join(base, "a");
    await write(root, "layout.html", "HTML");
    await write(root, "layout.txt", "TXT");
    await write(root, "page.html", "{{> layout}}");

    const err = await compileSnapshot([root], 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReloadError);
    expect(err).toMatchObject({
      file: path.join(root, "layout.txt"),
      message: 'Templates layout.html and layout.txt both define the partial "layout"',
    });
  });

  it("rejects the whole set when one template does not parse", async () => {
    const root = path.join(base, "a");
    await write(root, "good.html", "fine");
    await write(root, "broken.html", "{{#if open}}never closed");

    const err = await compileSnapshot([root], 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReloadError);
    expect(err).toMatchObject({ file: path.join(root, "broken.html") });
    expect(String(err)).toContain("Could not compile template broken.html");
  });

  it("fails on a missing directory", async () => {
    await expect(compileSnapshot([path.join(base, "missing")], 1)).rejects.toThrow(
      `Could not read template directory ${path.join(base, "missing")}`,
    );
  });

  it("fails rendering an unknown template with a 500", async () => {
    const root = path.join(base, "a");
    await mkdir(root);
    const snapshot = await compileSnapshot([root], 1);

    const err = (() => {
      try {
        snapshot.render("nope.html");
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(HTTPException);
    expect(err).toMatchObject({ status: 500, message: "Template not found: nope.html" });
  });

  it("renders strictly", async () => {
    const root = path.join(base, "a");
    await write(root, "greet.html", "Hello {{name}}");
    const snapshot = await compileSnapshot([root], 1);

    expect(() => snapshot.render("greet.html", {})).toThrow('"name" not defined');
  });
});

describe("TemplateRegistry", () => {
  it("swaps in a new snapshot on reload", async () => {
    const root = path.join(base, "a");
    await write(root, "index.html", "v1");
    const registry = await TemplateRegistry.load([root]);
    const before = registry.current();

    await write(root, "index.html", "v2");
    await registry.reload();

    expect(before.render("index.html")).toBe("v1");
    expect(registry.current().render("index.html")).toBe("v2");
    expect(registry.current().generation).toBe(2);
    expect(registry.generation).toBe(2);
    expect(templateGeneration.get()).toBe(2);
  });

  it("keeps the live snapshot when a reload fails", async () => {
    const root = path.join(base, "a");
    await write(root, "index.html", "v1");
    const registry = await TemplateRegistry.load([root]);

    await write(root, "index.html", "{{#each}}");
    await expect(registry.reload()).rejects.toBeInstanceOf(ReloadError);

    expect(registry.current().render("index.html")).toBe("v1");
    expect(registry.generation).toBe(1);

    await write(root, "index.html", "fixed");
    await registry.reload();
    expect(registry.current().render("index.html")).toBe("fixed");
    expect(registry.generation).toBe(2);
  });

  it("runs overlapping reloads one after the other", async () => {
    const root = path.join(base, "a");
    await write(root, "index.html", "v1");
    const registry = await TemplateRegistry.load([root]);

    await Promise.all([registry.reload(), registry.reload(), registry.reload()]);

    expect(registry.generation).toBe(4);
  });

  it("reports its roots for watching", async () => {
    const first = path.join(base, "a");
    const second = path.join(base, "b");
    await mkdir(first);
    await mkdir(second);

    const registry = await TemplateRegistry.load([first, second]);

    expect(await registry.watchRoots()).toEqual([first, second]);
  });
});
