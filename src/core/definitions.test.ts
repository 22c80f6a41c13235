import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  loadOverrides,
  loadServiceDefinition,
  loadTaskDefinition,
  parseOverrides,
} from "./definitions.js";
import { DefinitionError } from "./errors.js";

const tempDirs: string[] = [];

function writeFile(filename: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "definitions-"));
  tempDirs.push(dir);

  const filePath = path.join(dir, filename);
  fs.writeFileSync(filePath, contents, "utf8");
  return filePath;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  delete process.env.DECKHAND_TEST_IMAGE;
});

describe("loadTaskDefinition", () => {
  it("reads JSON task definitions", async () => {
    const filePath = writeFile(
      "ecs-task-def.json",
      JSON.stringify({
        family: "batch",
        cpu: "256",
        containerDefinitions: [{ name: "app", image: "nginx:latest", essential: true }],
      }),
    );

    const td = await loadTaskDefinition(filePath);

    expect(td.family).toBe("batch");
    expect(td.cpu).toBe("256");
    expect(td.containerDefinitions?.[0]?.image).toBe("nginx:latest");
  });

  it("reads YAML and expands environment variables", async () => {
    process.env.DECKHAND_TEST_IMAGE = "registry.local/app:42";
    const filePath = writeFile(
      "ecs-task-def.yaml",
      ["family: batch", "containerDefinitions:", "  - name: app", "    image: ${DECKHAND_TEST_IMAGE}"].join(
        "\n",
      ),
    );

    const td = await loadTaskDefinition(filePath);

    expect(td.containerDefinitions?.[0]?.image).toBe("registry.local/app:42");
  });

  it("rejects definitions without a family", async () => {
    const filePath = writeFile(
      "ecs-task-def.json",
      JSON.stringify({ containerDefinitions: [{ name: "app" }] }),
    );

    await expect(loadTaskDefinition(filePath)).rejects.toThrow(
      `invalid definition in ${filePath}:\nfamily: Expected string, received undefined`,
    );
  });

  it("rejects fields the task definition API does not take", async () => {
    const filePath = writeFile(
      "ecs-task-def.json",
      JSON.stringify({ family: "batch", containerDefinitions: [{ name: "app" }], owner: "ops" }),
    );

    await expect(loadTaskDefinition(filePath)).rejects.toThrow(
      `invalid definition in ${filePath}:\n<root>: Unrecognized keys: owner`,
    );
  });

  it("checks container fields against their API types", async () => {
    const filePath = writeFile(
      "ecs-task-def.json",
      JSON.stringify({ family: "batch", containerDefinitions: [{ name: "app", memory: "512" }] }),
    );

    await expect(loadTaskDefinition(filePath)).rejects.toThrow(
      `invalid definition in ${filePath}:\ncontainerDefinitions.0.memory: Expected number, received string`,
    );
  });

  it("reports unreadable files as definition errors", async () => {
    const missing = path.join(os.tmpdir(), "deckhand-missing", "nope.json");

    await expect(loadTaskDefinition(missing)).rejects.toBeInstanceOf(DefinitionError);
  });

  it("reports malformed JSON as definition errors", async () => {
    const filePath = writeFile("ecs-task-def.json", "{ not json");

    await expect(loadTaskDefinition(filePath)).rejects.toThrow(`failed to parse ${filePath}`);
  });

  it("reports unset environment variables as definition errors", async () => {
    const filePath = writeFile(
      "ecs-task-def.json",
      JSON.stringify({ family: "${DECKHAND_TEST_IMAGE}", containerDefinitions: [{ name: "a" }] }),
    );

    await expect(loadTaskDefinition(filePath)).rejects.toBeInstanceOf(DefinitionError);
  });
});

describe("loadServiceDefinition", () => {
  it("reads placement and networking fields", async () => {
    const filePath = writeFile(
      "ecs-service-def.json",
      JSON.stringify({
        launchType: "FARGATE",
        platformVersion: "LATEST",
        networkConfiguration: {
          awsvpcConfiguration: { subnets: ["subnet-1"], assignPublicIp: "DISABLED" },
        },
        enableExecuteCommand: true,
        desiredCount: 2,
      }),
    );

    const sv = await loadServiceDefinition(filePath);

    expect(sv).not.toHaveProperty("desiredCount");
    expect(sv.launchType).toBe("FARGATE");
    expect(sv.networkConfiguration?.awsvpcConfiguration?.subnets).toEqual(["subnet-1"]);
    expect(sv.enableExecuteCommand).toBe(true);
  });

  it("rejects fields with the wrong type", async () => {
    const filePath = writeFile(
      "ecs-service-def.json",
      JSON.stringify({ enableExecuteCommand: "yes" }),
    );

    await expect(loadServiceDefinition(filePath)).rejects.toThrow(
      "enableExecuteCommand: Expected boolean, received string",
    );
  });
});

describe("overrides", () => {
  it("parses inline override JSON", () => {
    const ov = parseOverrides('{"containerOverrides":[{"name":"app","command":["echo","hi"]}]}');

    expect(ov.containerOverrides?.[0]?.command).toEqual(["echo", "hi"]);
  });

  it("rejects inline overrides that are not JSON", () => {
    expect(() => parseOverrides("{oops")).toThrow(DefinitionError);
    expect(() => parseOverrides("{oops")).toThrow(/^malformed JSON: /);
  });

  it("rejects inline overrides that are not objects", () => {
    expect(() => parseOverrides("[1, 2]")).toThrow(DefinitionError);
  });

  it("loads overrides from a file", async () => {
    const filePath = writeFile("overrides.json", JSON.stringify({ cpu: "512" }));

    const ov = await loadOverrides(filePath);

    expect(ov.cpu).toBe("512");
  });
});
