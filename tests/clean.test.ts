import { beforeEach, describe, expect, it, vi } from "vitest";
import { CleanupExecutor, CleanupSession } from "../src/clean";
import { BatchGate, type ConfirmationGate, InteractiveGate } from "../src/confirm";
import { DockerCliClient } from "../src/docker";
import { RemovalError, RuntimeQueryError } from "../src/errors";
import type { CleanupCandidateSet } from "../src/types";
import { plainDisplayContext } from "../src/ui";
import {
  FakeRuntimeClient,
  ScriptedPrompter,
  collectingWriter,
  container,
  image,
  mockDockerExec,
  network,
  toJsonLines,
  volume
} from "./helpers";

function containerSet(count: number): CleanupCandidateSet {
  return {
    type: "containers",
    label: "Stopped containers",
    items: Array.from({ length: count }, (_, index) => container(`c${index + 1}`, "exited", 1000))
  };
}

describe("CleanupExecutor", () => {
  it("removes every handle and adds up reclaimed bytes", async () => {
    const set = containerSet(3);
    const client = new FakeRuntimeClient([...set.items]);

    const result = await new CleanupExecutor(client).execute(set);

    expect(result).toEqual({ type: "containers", removed: 3, failures: [], reclaimedBytes: 3000 });
    expect(client.removeCalls).toHaveLength(3);
    expect(client.remaining).toEqual([]);
  });

  it("keeps going after a failed removal", async () => {
    const set = containerSet(5);
    const client = new FakeRuntimeClient([...set.items]);
    client.failingIds.add("c3");

    const result = await new CleanupExecutor(client).execute(set);

    expect(client.removeCalls.map((handle) => handle.id)).toEqual(["c1", "c2", "c3", "c4", "c5"]);
    expect(result.removed).toBe(4);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].handle.id).toBe("c3");
    expect(result.failures[0].error).toBeInstanceOf(RemovalError);
  });

  it("counts a handle that vanished since listing as removed", async () => {
    const set = containerSet(2);
    const client = new FakeRuntimeClient([set.items[0]]);

    const result = await new CleanupExecutor(client).execute(set);

    expect(result.removed).toBe(2);
    expect(result.reclaimedBytes).toBe(1000);
  });

  it("reports each outcome to the listener", async () => {
    const set = containerSet(2);
    const client = new FakeRuntimeClient([...set.items]);
    client.failingIds.add("c2");
    const onRemoved = vi.fn();
    const onFailed = vi.fn();

    await new CleanupExecutor(client, { onRemoved, onFailed }).execute(set);

    expect(onRemoved).toHaveBeenCalledWith(set.items[0], 1000);
    expect(onFailed).toHaveBeenCalledTimes(1);
    expect(onFailed.mock.calls[0][0]).toBe(set.items[1]);
  });
});

describe("CleanupSession", () => {
  const ctx = plainDisplayContext();

  let out: ReturnType<typeof collectingWriter>;

  beforeEach(() => {
    out = collectingWriter();
  });

  function batch(client: FakeRuntimeClient, ...requested: Array<"containers" | "volumes" | "networks" | "images">) {
    return new CleanupSession({ client, gate: new BatchGate(new Set(requested), ctx, out), ctx, out });
  }

  it("says so when a category has nothing to remove", async () => {
    const client = new FakeRuntimeClient([container("c1", "running")]);

    const result = await batch(client, "containers").cleanResource("containers");

    expect(result).toBeUndefined();
    expect(out.lines).toContain("[ok] No stopped containers found");
    expect(client.removeCalls).toEqual([]);
  });

  it("asks the runtime for stopped containers only", async () => {
    const client = new FakeRuntimeClient();

    await batch(client, "containers").cleanResource("containers");

    expect(client.listCalls).toEqual([{ type: "containers", filter: { status: ["exited", "created", "dead"] } }]);
  });

  it("removes only dangling volumes", async () => {
    const client = new FakeRuntimeClient([volume("old-1", true), volume("pgdata", false), volume("old-2", true)]);

    const result = await batch(client, "volumes").cleanResource("volumes");

    expect(client.removeCalls.map((handle) => handle.id)).toEqual(["old-1", "old-2"]);
    expect(result?.removed).toBe(2);
    expect(out.lines).toContain("[ok] Removed 2 dangling volumes");
  });

  it("never calls remove when the operator declines", async () => {
    const client = new FakeRuntimeClient([container("c1", "exited"), container("c2", "exited")]);
    const prompter = new ScriptedPrompter({ confirm: [false] });
    const session = new CleanupSession({ client, gate: new InteractiveGate(prompter, ctx, out), ctx, out });

    const result = await session.cleanResource("containers");

    expect(result).toBeUndefined();
    expect(client.removeCalls).toHaveLength(0);
    expect(out.lines).toContain("[i] Skipped stopped containers");
  });

  it("treats an unreadable listing as an empty category and carries on", async () => {
    const client = new FakeRuntimeClient([network("n1", "app_default")]);
    const list = client.list.bind(client);
    vi.spyOn(client, "list").mockImplementation(async (type, filter) => {
      if (type === "volumes") throw new RuntimeQueryError("volumes", "Unreadable volumes listing");
      return list(type, filter);
    });

    const results = await batch(client, "volumes", "networks").cleanMany(["volumes", "networks"]);

    expect(out.errors).toContain("[!] Could not list volumes: Unreadable volumes listing");
    expect(results).toHaveLength(1);
    expect(results[0].type).toBe("networks");
  });

  it("reports failures apart from successes", async () => {
    const client = new FakeRuntimeClient([image("sha256:a1"), image("sha256:a2")]);
    client.failingIds.add("sha256:a2");

    const result = await batch(client, "images").cleanResource("images");

    expect(result?.removed).toBe(1);
    expect(result?.failures).toHaveLength(1);
    expect(out.errors).toContain("[!] Failed to remove a2: conflict: sha256:a2 is in use");
    expect(out.errors).toContain("[x] 1 of 2 dangling images could not be removed");
  });

  it("skips categories the batch gate was not asked for", async () => {
    const client = new FakeRuntimeClient([container("c1", "exited")]);

    await batch(client, "volumes").cleanResource("containers");

    expect(client.removeCalls).toEqual([]);
  });

  describe("cleanAggressive", () => {
    const handles = () => [
      container("c1", "exited"),
      container("c2", "running"),
      volume("v1", true),
      network("n1", "app_default"),
      network("n0", "bridge"),
      image("sha256:t1", { tagged: true }),
      image("sha256:u1", { referenced: true })
    ];

    it("does nothing when the token is only 'y'", async () => {
      const client = new FakeRuntimeClient(handles());
      const prompter = new ScriptedPrompter({ text: ["y"] });
      const session = new CleanupSession({ client, gate: new InteractiveGate(prompter, ctx, out), ctx, out });

      const results = await session.cleanAggressive();

      expect(results).toEqual([]);
      expect(client.removeCalls).toEqual([]);
      expect(client.buildCacheCalls).toBe(0);
      expect(out.lines).toContain("[i] Cancelled aggressive cleanup");
    });

    it("removes tagged unused images and prunes build cache after 'YES'", async () => {
      const client = new FakeRuntimeClient(handles());
      client.buildCacheBytes = 2_000_000;
      const prompter = new ScriptedPrompter({ text: ["YES"] });
      const session = new CleanupSession({ client, gate: new InteractiveGate(prompter, ctx, out), ctx, out });

      const results = await session.cleanAggressive();

      expect(client.removeCalls.map((handle) => handle.id)).toEqual(["c1", "v1", "n1", "sha256:t1"]);
      expect(results.map((result) => result.type)).toEqual(["containers", "volumes", "networks", "images"]);
      expect(client.buildCacheCalls).toBe(1);
      expect(out.lines).toContain("[ok] Pruned build cache (2.0 MB reclaimed)");
    });

    it("removes an image whose only user was a container it just removed", async () => {
      const docker = mockDockerExec();
      docker.setResponse(
        [
          "ps", "-a", "--no-trunc", "--size",
          "--filter", "status=exited", "--filter", "status=created", "--filter", "status=dead",
          "--format", "{{json .}}"
        ],
        toJsonLines([{ ID: "c1", Names: "app-old", State: "exited", Size: "0B" }])
      );
      docker.setResponse(["volume", "ls", "--format", "{{json .}}"], "");
      docker.setResponse(["network", "ls", "-q", "--no-trunc"], "");
      docker.setResponse(
        ["images", "--no-trunc", "--format", "{{json .}}"],
        toJsonLines([{ ID: "sha256:t1", Repository: "app", Tag: "latest", Size: "50MB" }])
      );
      docker.setResponses(["ps", "-a", "-q", "--no-trunc"], ["c1\n", ""]);
      docker.setResponse(["container", "inspect", "--format", "{{.Image}}", "c1"], "sha256:t1\n");
      docker.setResponse(["container", "rm", "c1"], "c1\n");
      docker.setResponse(["image", "rm", "sha256:t1"], "Deleted: sha256:t1\n");
      docker.setResponse(["builder", "prune", "-a", "-f"], "Total reclaimed space: 0B\n");
      const gate: ConfirmationGate = { confirm: async () => true };
      const session = new CleanupSession({ client: new DockerCliClient(docker.execDockerMock), gate, ctx, out });

      const results = await session.cleanAggressive();

      const removals = docker
        .getCallLog()
        .map((args) => args.join(" "))
        .filter((command) => command.includes(" rm "));
      expect(removals).toEqual(["container rm c1", "image rm sha256:t1"]);
      expect(results.map((result) => [result.type, result.removed])).toEqual([
        ["containers", 1],
        ["images", 1]
      ]);
      expect(out.lines).toContain("[ok] Removed 1 unused images (50 MB reclaimed)");
    });

    it("warns when build cache pruning fails", async () => {
      const client = new FakeRuntimeClient([]);
      vi.spyOn(client, "pruneBuildCache").mockRejectedValue(new RemovalError("build-cache", "builder not available"));
      const gate: ConfirmationGate = { confirm: async () => true };
      const session = new CleanupSession({ client, gate, ctx, out });

      await session.cleanAggressive();

      expect(out.errors).toContain("[!] Failed to prune build cache: builder not available");
    });
  });
});
