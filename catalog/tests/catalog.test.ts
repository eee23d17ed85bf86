/**
 * UAGen Catalog — Tests
 *
 * Tests for the validator, loader and Catalog helpers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { stringify as stringifyYaml } from "yaml";
import {
  Catalog,
  CatalogData,
  FileNotFoundError,
  InvalidFormatError,
  PermissionDeniedError,
  UserAgentError,
  assertCatalog,
  detectFormat,
  isCatalogData,
  isUserAgentError,
  loadCatalog,
  parseCatalog,
  validateCatalog,
} from "../src";

vi.mock("fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs")>();
  return { ...actual, readFileSync: vi.fn(actual.readFileSync) };
});

// ─── Helper: Minimal Valid Catalog ───────────────────────────

function sampleCatalog(): CatalogData {
  return {
    browsers: [
      {
        name: "Chrome",
        versions: ["119.0.0.0", "120.0.0.0"],
        os: [
          { name: "Windows", versions: ["10.0"] },
          { name: "Linux", versions: ["x86_64", "i686"] },
        ],
      },
      {
        name: "Firefox",
        versions: ["121.0"],
        os: [{ name: "Mac OS", versions: ["10.15"] }],
      },
    ],
  };
}

function firstError(data: unknown): string {
  const result = validateCatalog(data);
  expect(result.valid).toBe(false);
  return result.errors[0].message;
}

// ─── Schema Validation Tests ─────────────────────────────────

describe("Catalog Validation", () => {
  it("should accept a well-formed catalog", () => {
    const result = validateCatalog(sampleCatalog());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(isCatalogData(sampleCatalog())).toBe(true);
  });

  it("should accept extra fields", () => {
    const data = { ...sampleCatalog(), updated: "2026-01-01" };
    expect(validateCatalog(data).valid).toBe(true);
  });

  it("should reject a non-object document", () => {
    expect(firstError([])).toBe("Catalog data must be an object");
    expect(firstError("browsers")).toBe("Catalog data must be an object");
  });

  it("should reject a catalog without browsers", () => {
    expect(firstError({})).toBe("Catalog data must contain a 'browsers' key");
  });

  it("should reject an empty browsers list", () => {
    expect(firstError({ browsers: [] })).toBe(
      "'browsers' must be a non-empty list",
    );
  });

  it("should reject browsers that is not a list", () => {
    expect(firstError({ browsers: { name: "Chrome" } })).toBe(
      "'browsers' must be a non-empty list",
    );
  });

  it("should report the rule and path of the violation", () => {
    const result = validateCatalog({ browsers: [] });
    expect(result.errors).toEqual([
      {
        path: "/browsers",
        message: "'browsers' must be a non-empty list",
        rule: "schema:minItems",
      },
    ]);
  });

  it("should reject a browser that is not an object", () => {
    expect(firstError({ browsers: ["Chrome"] })).toBe(
      "Browser at index 0 must be an object",
    );
  });

  it("should name the missing browser field", () => {
    const data = { browsers: [{ name: "Chrome", versions: ["120.0"] }] };
    expect(firstError(data)).toBe("Browser at index 0 is missing 'os' field");
  });

  it("should reject a browser with a non-string name", () => {
    const data = sampleCatalog();
    const browsers: unknown[] = [
      data.browsers[0],
      { ...data.browsers[1], name: 5 },
    ];
    expect(firstError({ browsers })).toBe(
      "Browser at index 1 must have a string 'name'",
    );
  });

  it("should reject empty browser versions", () => {
    const data = sampleCatalog();
    data.browsers[0].versions = [];
    expect(firstError(data)).toBe(
      "Browser 'Chrome' must have non-empty 'versions' list",
    );
  });

  it("should reject an empty os list", () => {
    const data = sampleCatalog();
    data.browsers[1].os = [];
    expect(firstError(data)).toBe(
      "Browser 'Firefox' must have non-empty 'os' list",
    );
  });

  it("should reject non-string browser versions", () => {
    const data = {
      browsers: [{ name: "Chrome", versions: [120], os: [{ name: "Windows", versions: ["10.0"] }] }],
    };
    expect(firstError(data)).toBe(
      "Browser 'Chrome' has a non-string version at index 0",
    );
  });

  it("should reject an OS entry that is not an object", () => {
    const data = { browsers: [{ name: "Chrome", versions: ["120.0"], os: ["Windows"] }] };
    expect(firstError(data)).toBe(
      "OS at index 0 for browser 'Chrome' must be an object",
    );
  });

  it("should reject an OS entry without a name", () => {
    const data = {
      browsers: [{ name: "Chrome", versions: ["120.0"], os: [{ versions: ["10.0"] }] }],
    };
    expect(firstError(data)).toBe(
      "OS at index 0 for browser 'Chrome' is missing 'name' field",
    );
  });

  it("should reject an OS entry without versions", () => {
    const data = {
      browsers: [{ name: "Chrome", versions: ["120.0"], os: [{ name: "Windows" }] }],
    };
    expect(firstError(data)).toBe(
      "OS 'Windows' for browser 'Chrome' must have non-empty 'versions' list",
    );
  });

  it("should reject an OS entry with empty versions", () => {
    const data = sampleCatalog();
    data.browsers[0].os[1].versions = [];
    expect(firstError(data)).toBe(
      "OS 'Linux' for browser 'Chrome' must have non-empty 'versions' list",
    );
  });

  it("should reject non-string OS versions", () => {
    const data = {
      browsers: [{ name: "Chrome", versions: ["120.0"], os: [{ name: "Windows", versions: [10] }] }],
    };
    expect(firstError(data)).toBe(
      "OS 'Windows' for browser 'Chrome' has a non-string version at index 0",
    );
  });

  it("assertCatalog should throw InvalidFormatError", () => {
    expect(() => assertCatalog({})).toThrow(InvalidFormatError);
    expect(() => assertCatalog({})).toThrow(
      "Catalog data must contain a 'browsers' key",
    );
    expect(() => assertCatalog(sampleCatalog())).not.toThrow();
  });
});

// ─── Catalog Loader Tests ────────────────────────────────────

describe("Catalog Loader", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "uagen-catalog-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it("should load a JSON catalog into an equivalent structure", () => {
    const filePath = writeFile("user_agents.json", JSON.stringify(sampleCatalog()));
    const catalog = loadCatalog(filePath);
    expect(catalog.data).toEqual(sampleCatalog());
    expect(catalog.source).toBe(filePath);
  });

  it("should load a YAML catalog", () => {
    const filePath = writeFile("user_agents.yaml", stringifyYaml(sampleCatalog()));
    expect(loadCatalog(filePath).data).toEqual(sampleCatalog());
  });

  it("should fail with FileNotFoundError for a missing file", () => {
    const filePath = path.join(dir, "missing.json");
    expect(() => loadCatalog(filePath)).toThrow(FileNotFoundError);
    expect(() => loadCatalog(filePath)).toThrow(`File not found: ${filePath}`);
  });

  it("should fail with InvalidFormatError for malformed JSON", () => {
    const filePath = writeFile("broken.json", "{ \"browsers\": [");
    try {
      loadCatalog(filePath);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidFormatError);
      expect(isUserAgentError(err) && err.category).toBe("INVALID_FORMAT");
      expect(err instanceof Error && err.message.startsWith("Invalid JSON format: ")).toBe(true);
    }
  });

  it("should fail with InvalidFormatError for malformed YAML", () => {
    const filePath = writeFile("broken.yml", "browsers: [unclosed");
    expect(() => loadCatalog(filePath)).toThrow(/^Invalid YAML format: /);
  });

  it("should fail with InvalidFormatError when browsers is missing", () => {
    const filePath = writeFile("empty.json", "{}");
    expect(() => loadCatalog(filePath)).toThrow(InvalidFormatError);
  });

  it("should fail with InvalidFormatError when browsers is empty", () => {
    const filePath = writeFile("empty.json", JSON.stringify({ browsers: [] }));
    expect(() => loadCatalog(filePath)).toThrow(
      "'browsers' must be a non-empty list",
    );
  });

  it("should wrap other read failures in a UserAgentError", () => {
    try {
      loadCatalog(dir);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UserAgentError);
      expect(isUserAgentError(err) && err.category).toBe("USER_AGENT_ERROR");
      expect(err instanceof Error && err.message.startsWith("Error loading user agents: ")).toBe(true);
    }
  });

  function failRead(code: string, message: string): void {
    vi.mocked(fs.readFileSync).mockImplementationOnce(() => {
      throw Object.assign(new Error(message), { code });
    });
  }

  it.each(["EACCES", "EPERM"])(
    "should fail with PermissionDeniedError on %s",
    (code) => {
      const filePath = path.join(dir, "locked.json");
      failRead(code, `${code}: operation not permitted, open '${filePath}'`);
      try {
        loadCatalog(filePath);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(PermissionDeniedError);
        expect(isUserAgentError(err) && err.category).toBe("PERMISSION_DENIED");
        expect(err instanceof Error && err.message).toBe(
          `Permission denied: cannot read ${filePath}`,
        );
      }
    },
  );

  it("should wrap unknown error codes in a UserAgentError", () => {
    const filePath = path.join(dir, "busy.json");
    failRead("EMFILE", "EMFILE: too many open files");
    try {
      loadCatalog(filePath);
      expect.unreachable();
    } catch (err) {
      expect(err).not.toBeInstanceOf(PermissionDeniedError);
      expect(isUserAgentError(err) && err.category).toBe("USER_AGENT_ERROR");
      expect(err instanceof Error && err.message).toBe(
        "Error loading user agents: EMFILE: too many open files",
      );
    }
  });

  it("should keep unquoted YAML versions as strings", () => {
    const filePath = writeFile(
      "unquoted.yaml",
      [
        "browsers:",
        "  - name: Firefox",
        "    versions: [121.0, 120]",
        "    os:",
        "      - name: Mac OS",
        "        versions: [10.15, 14.2]",
        "",
      ].join("\n"),
    );
    expect(loadCatalog(filePath).data).toEqual({
      browsers: [
        {
          name: "Firefox",
          versions: ["121.0", "120"],
          os: [{ name: "Mac OS", versions: ["10.15", "14.2"] }],
        },
      ],
    });
  });

  it("should parse text without touching the disk", () => {
    const catalog = parseCatalog(JSON.stringify(sampleCatalog()));
    expect(catalog.size).toBe(2);
    expect(catalog.source).toBeUndefined();
  });

  it("should detect the format from the extension", () => {
    expect(detectFormat("agents.yaml")).toBe("yaml");
    expect(detectFormat("agents.YML")).toBe("yaml");
    expect(detectFormat("agents.json")).toBe("json");
    expect(detectFormat("agents")).toBe("json");
  });
});

// ─── Catalog Helpers ─────────────────────────────────────────

describe("Catalog", () => {
  let catalog: Catalog;

  beforeEach(() => {
    catalog = new Catalog(sampleCatalog());
  });

  it("should report its size", () => {
    expect(catalog.size).toBe(2);
    expect(catalog.browsers.map((b) => b.name)).toEqual(["Chrome", "Firefox"]);
  });

  it("should find browsers case-insensitively", () => {
    expect(catalog.getBrowser("chrome")?.name).toBe("Chrome");
    expect(catalog.has("FIREFOX")).toBe(true);
    expect(catalog.has("Opera")).toBe(false);
  });

  it("should list distinct operating systems in first-seen order", () => {
    expect(catalog.operatingSystems()).toEqual(["Windows", "Linux", "Mac OS"]);
  });

  it("should count browser/OS version combinations", () => {
    // Chrome: 2 versions x 3 OS versions, Firefox: 1 x 1
    expect(catalog.combinationCount).toBe(7);
  });
});
