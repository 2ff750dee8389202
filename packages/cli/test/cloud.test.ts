/**
 * Tests for the cloud command layer against the in-process tracking service
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { appendFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { getCloudUser, loadUserConfig, userConfigPath, type DagSummary } from "@pipecloud/sdk";
import { FakeTrackingService, createTempHome, removeDir, writeUserConfig } from "@pipecloud/testkit";
import { NO_KEY_MESSAGE, openCloudCommands, type CloudCommands } from "../src/lib/cloud.js";
import { MISSING_KEY_MESSAGE } from "../src/lib/errors.js";

const KEY = "TEST_KEY12345678987654";
const OTHER_KEY = "SEC_KEY123456789876543";
const HOST = "http://tracking.test";

const SAMPLE_DAG: DagSummary = {
  dag_size: "2",
  tasks: {
    features: {
      products: "features.parquet",
      status: "Skipped",
      type: "ShellTask",
      upstream: { get: "get.parquet" },
    },
    get: {
      products: "get.parquet",
      status: "Skipped",
      type: "ShellTask",
      upstream: {},
    },
  },
};

describe("cloud commands", () => {
  let home: string;
  let service: FakeTrackingService;
  let commands: CloudCommands;

  beforeEach(async () => {
    home = await createTempHome();
    await writeUserConfig(home, "stats_enabled: False\n");
    service = new FakeTrackingService([KEY]);
    commands = openCloudCommands({ home, host: HOST, fetch: service.fetch });
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(home);
  });

  const storedConfig = () => loadUserConfig(home);

  describe("keys", () => {
    it("should store the key next to existing settings", async () => {
      expect(await commands.setKey(KEY)).toEqual({ ok: true, value: `Key was stored ${KEY}` });
      expect(await storedConfig()).toEqual({ stats_enabled: false, cloud_key: KEY });
    });

    it("should create the config when there is none", async () => {
      const fresh = await createTempHome();
      try {
        await openCloudCommands({ home: fresh, host: HOST }).setKey(KEY);
        expect(await loadUserConfig(fresh)).toEqual({ cloud_key: KEY });
      } finally {
        await removeDir(fresh);
      }
    });

    it("should overwrite a previous key", async () => {
      await commands.setKey(KEY);
      await commands.setKey(OTHER_KEY);

      expect(await storedConfig()).toEqual({ stats_enabled: false, cloud_key: OTHER_KEY });
    });

    it("should refuse malformed keys", async () => {
      for (const value of [undefined, "12345"]) {
        expect(await commands.setKey(value)).toEqual({
          ok: false,
          code: "E_KEY_MALFORMED",
          message: "The API key is malformed. Please validate your key or contact the admin.",
        });
      }
      expect(await storedConfig()).toEqual({ stats_enabled: false });
    });

    it("should report a config it cannot edit", async () => {
      await writeUserConfig(home, "stats_enabled: [no\n");

      const result = await commands.setKey(KEY);

      expect(result).toMatchObject({ ok: false, code: "CONFIG_PARSE_ERROR" });
      expect(await commands.getKey()).toMatchObject({ ok: false, code: "E_KEY_MISSING" });
    });

    it("should read the stored key back", async () => {
      await commands.setKey(KEY);
      expect(await commands.getKey()).toEqual({ ok: true, value: KEY });
      expect(await getCloudUser(home)).toBe(KEY);
    });

    it("should say when no key is stored", async () => {
      expect(await commands.getKey()).toEqual({
        ok: false,
        code: "E_KEY_MISSING",
        message: NO_KEY_MESSAGE,
      });
    });

    it("should take the last key when the file repeats it", async () => {
      await commands.setKey(KEY);
      await appendFile(userConfigPath(home), "cloud_key: SEC_KEY12345678987654\n", "utf-8");

      expect(await commands.getKey()).toEqual({ ok: true, value: "SEC_KEY12345678987654" });
    });
  });

  describe("pipelines", () => {
    beforeEach(async () => {
      await commands.setKey(KEY);
    });

    it("should write, read and delete a run", async () => {
      const written = await commands.writePipeline({ pipelineId: "run-1", status: "started" });
      expect(written.ok && written.value.pipeline_id).toBe("run-1");

      const read = await commands.getPipelines({ pipelineId: "run-1" });
      expect(read.ok && read.value.map((p) => p.pipeline_id)).toEqual(["run-1"]);

      expect(await commands.deletePipeline("run-1")).toEqual({
        ok: true,
        value: { pipeline_id: "run-1" },
      });
      expect(service.records()).toEqual([]);
    });

    it("should update an existing run", async () => {
      await commands.writePipeline({ pipelineId: "run-1", status: "started" });
      await commands.writePipeline({ pipelineId: "run-1", status: "finished" });

      const read = await commands.getPipelines({ pipelineId: "run-1" });
      expect(read.ok && read.value[0]?.status).toBe("finished");
    });

    it("should keep the log of a failed run", async () => {
      await commands.writePipeline({
        pipelineId: "run-1",
        status: "error",
        log: "Error: issue building the dag",
      });

      const read = await commands.getPipelines({ pipelineId: "run-1" });
      expect(read.ok && read.value[0]?.log).toBe("Error: issue building the dag");
    });

    it("should list every run", async () => {
      for (const id of ["a", "b", "c"]) {
        await commands.writePipeline({ pipelineId: id, status: "finished" });
      }

      const read = await commands.getPipelines({});
      expect(read.ok && read.value.length).toBe(3);
    });

    it("should resolve latest", async () => {
      await commands.writePipeline({ pipelineId: "a", status: "started" });
      await commands.writePipeline({ pipelineId: "b", status: "started" });

      const read = await commands.getPipelines({ pipelineId: "latest" });
      expect(read.ok && read.value[0]?.pipeline_id).toBe("b");
    });

    it("should return the dag only when asked", async () => {
      await commands.writePipeline({ pipelineId: "run-1", status: "finished", dag: SAMPLE_DAG });

      const withDag = await commands.getPipelines({ pipelineId: "run-1", includeDag: true });
      expect(withDag.ok && withDag.value[0]?.dag).toEqual(SAMPLE_DAG);

      const withoutDag = await commands.getPipelines({ pipelineId: "run-1" });
      expect(withoutDag.ok && "dag" in (withoutDag.value[0] ?? {})).toBe(false);
    });

    it("should read the dag from a file", async () => {
      const dagFile = join(home, "dag.json");
      await writeFile(dagFile, JSON.stringify(SAMPLE_DAG), "utf-8");

      await commands.writePipeline({ pipelineId: "run-1", status: "finished", dagSource: dagFile });

      expect(service.records()[0]?.dag).toEqual(SAMPLE_DAG);
    });

    it("should report a dag file it cannot read", async () => {
      const missing = join(home, "missing.json");
      const result = await commands.writePipeline({
        pipelineId: "run-1",
        status: "finished",
        dagSource: missing,
      });

      expect(result).toMatchObject({ ok: false, code: "E_DAG" });
      expect(result.ok === false && result.message.startsWith(`Failed to read ${missing}: `)).toBe(true);
      expect(service.requests).toEqual([]);
    });

    it("should reject a malformed dag before sending", async () => {
      const result = await commands.writePipeline({
        pipelineId: "run-1",
        status: "finished",
        dag: { dag_size: "1", tasks: { a: { products: "a", status: "s", type: "t", upstream: { b: "b" } } } },
      });

      expect(result).toEqual({
        ok: false,
        code: "E_DAG",
        message: 'Invalid DAG summary: tasks.a.upstream.b: upstream task "b" is not part of the DAG',
      });
      expect(service.requests).toEqual([]);
    });

    it("should require an id and a status", async () => {
      expect(await commands.writePipeline({ pipelineId: "", status: "started" })).toMatchObject({
        ok: false,
        message: "No input pipeline_id",
      });
      expect(await commands.writePipeline({ pipelineId: "run-1", status: "" })).toMatchObject({
        ok: false,
        message: "No input pipeline status",
      });
      expect(await commands.deletePipeline(undefined)).toMatchObject({
        ok: false,
        message: "No input pipeline_id",
      });
      expect(service.requests).toEqual([]);
    });

    it("should word unknown runs by operation", async () => {
      expect(await commands.getPipelines({ pipelineId: "TEST_PIPELINE" })).toEqual({
        ok: false,
        code: "ENOENT",
        message: "Pipeline TEST_PIPELINE was not found",
      });
      expect(await commands.deletePipeline("TEST_PIPELINE")).toEqual({
        ok: false,
        code: "ENOENT",
        message: "Pipeline TEST_PIPELINE doesn't exist",
      });
    });

    it("should report a key the service rejects", async () => {
      await commands.setKey("2AhdF2MnRDw-ZZZZZZZZZZ");

      expect(await commands.writePipeline({ pipelineId: "run-1", status: "started" })).toEqual({
        ok: false,
        code: "E_KEY_INVALID",
        message: "API_Key not valid",
      });
      expect(await commands.getPipelines({ pipelineId: "run-1" })).toMatchObject({
        message: "API_Key not valid",
      });
    });

    it("should report service failures", async () => {
      service.respondOnce(503, "maintenance");

      expect(await commands.getPipelines({})).toEqual({
        ok: false,
        code: "E_SERVICE",
        message: "Tracking service error: Tracking service responded 503: maintenance",
      });
    });
  });

  it("should ask for a key before contacting the service", async () => {
    expect(await commands.getPipelines({})).toEqual({
      ok: false,
      code: "E_KEY_MISSING",
      message: MISSING_KEY_MESSAGE,
    });
    expect(service.requests).toEqual([]);
  });
});
