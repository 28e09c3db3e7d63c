import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import pino from "pino";
import {
  IngestHandler,
  collisionFreeName,
  createUniquenessToken,
  deriveIngestNames,
} from "../../src/services/ingest-handler";
import { MetricsRegistry } from "../../src/services/metrics-registry";
import { InMemoryMediaClient } from "../factories/in-memory-media-client";

const FIRST_ID = "1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed";
const SECOND_ID = "AAAA1111-2222-3333-4444-555566667777";

function sequence(...ids: string[]) {
  let index = 0;
  return () => {
    const id = ids[index % ids.length];
    index += 1;
    return id ?? "";
  };
}

function video(name: string, bytes: Buffer, deliveryId?: string) {
  return {
    name,
    content: Readable.from([bytes]),
    size: bytes.length,
    deliveryId,
  };
}

function createHandler(
  mediaClient: InMemoryMediaClient,
  metrics: MetricsRegistry,
  generateId: () => string
) {
  return new IngestHandler({
    mediaClient,
    metrics,
    transformName: "Content Adaptive Multiple Bitrate MP4",
    uploadSasTtlMinutes: 60,
    logger: pino({ level: "silent" }),
    generateId,
  });
}

describe("ingest naming", () => {
  it("takes the first ten uuid characters without dashes", () => {
    expect(createUniquenessToken(() => FIRST_ID)).toBe("1b9d6bcdb");
  });

  it("prefixes every derived name with the same token", () => {
    expect(deriveIngestNames("abc123")).toEqual({
      jobName: "job-abc123",
      inputAssetName: "input-abc123",
      outputAssetName: "output-abc123",
    });
  });

  it("builds collision names from the blob name and a fresh id, lower-cased", () => {
    expect(collisionFreeName("Movie.MP4", () => SECOND_ID)).toBe(
      "movie.mp4-aaaa1111-2222-3333-4444-555566667777"
    );
  });
});

describe("IngestHandler", () => {
  let mediaClient: InMemoryMediaClient;
  let metrics: MetricsRegistry;

  beforeEach(() => {
    mediaClient = new InMemoryMediaClient();
    metrics = new MetricsRegistry();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates assets, uploads the blob and submits a job for movie.mp4", async () => {
    const handler = createHandler(mediaClient, metrics, sequence(FIRST_ID));

    const result = await handler.handle(video("movie.mp4", Buffer.alloc(500000)));

    expect(result).toEqual({
      jobName: "job-1b9d6bcdb",
      inputAssetName: "input-1b9d6bcdb",
      outputAssetName: "output-1b9d6bcdb",
      transformName: "Content Adaptive Multiple Bitrate MP4",
    });

    expect(mediaClient.calls).toEqual([
      { op: "login" },
      {
        op: "createAsset",
        name: "input-1b9d6bcdb",
        description: "Import - movie.mp4",
      },
      {
        op: "getUploadContainerUrl",
        assetName: "input-1b9d6bcdb",
        expiresAt: new Date("2026-03-01T11:00:00.000Z"),
      },
      {
        op: "uploadContent",
        url: "https://teststorage.blob.core.windows.net/asset-input-1b9d6bcdb?sig=test",
        fileName: "movie.mp4",
        size: 500000,
      },
      { op: "getAsset", name: "output-1b9d6bcdb" },
      { op: "createAsset", name: "output-1b9d6bcdb", description: undefined },
      {
        op: "getOrCreateTransform",
        name: "Content Adaptive Multiple Bitrate MP4",
        created: true,
      },
      {
        op: "submitJob",
        transformName: "Content Adaptive Multiple Bitrate MP4",
        jobName: "job-1b9d6bcdb",
        inputAssetName: "input-1b9d6bcdb",
        outputAssetNames: ["output-1b9d6bcdb"],
      },
    ]);

    expect(await metrics.render()).toContain(
      'media_ingest_total{result="submitted"} 1'
    );
  });

  it("renames the output asset when the derived name is taken", async () => {
    mediaClient.assets.set("output-1b9d6bcdb", { description: "existing" });
    const handler = createHandler(
      mediaClient,
      metrics,
      sequence(FIRST_ID, SECOND_ID)
    );

    const result = await handler.handle(video("Movie.MP4", Buffer.from("video")));

    const replacement = "movie.mp4-aaaa1111-2222-3333-4444-555566667777";
    expect(result.outputAssetName).toBe(replacement);
    expect(result.jobName).toBe("job-1b9d6bcdb");

    const created = mediaClient.calls.flatMap((call) =>
      call.op === "createAsset" ? [call.name] : []
    );
    expect(created).toEqual(["input-1b9d6bcdb", replacement]);

    const submitted = mediaClient.calls.find((call) => call.op === "submitJob");
    expect(submitted).toEqual({
      op: "submitJob",
      transformName: "Content Adaptive Multiple Bitrate MP4",
      jobName: "job-1b9d6bcdb",
      inputAssetName: "input-1b9d6bcdb",
      outputAssetNames: [replacement],
    });
  });

  it("reuses the transform on later ingests", async () => {
    const handler = createHandler(
      mediaClient,
      metrics,
      sequence(FIRST_ID, SECOND_ID)
    );

    await handler.handle(video("a.mp4", Buffer.from("a")));
    await handler.handle(video("b.mp4", Buffer.from("b")));

    const transformCalls = mediaClient.calls.flatMap((call) =>
      call.op === "getOrCreateTransform" ? [call.created] : []
    );
    expect(transformCalls).toEqual([true, false]);
    expect(mediaClient.transforms.size).toBe(1);
  });

  it("removes the input asset and rethrows when the upload fails", async () => {
    const failure = new Error("upload refused");
    mediaClient.failUpload = failure;
    const handler = createHandler(mediaClient, metrics, sequence(FIRST_ID));

    await expect(
      handler.handle(video("movie.mp4", Buffer.from("x")))
    ).rejects.toBe(failure);

    expect(mediaClient.ops()).toEqual([
      "login",
      "createAsset",
      "getUploadContainerUrl",
      "uploadContent",
      "deleteAsset",
    ]);
    expect(mediaClient.assets.has("input-1b9d6bcdb")).toBe(false);
    expect(await metrics.render()).toContain(
      'media_ingest_total{result="failure"} 1'
    );
  });

  it("propagates a failed login without touching assets", async () => {
    const failure = new Error("invalid client secret");
    vi.spyOn(mediaClient, "login").mockRejectedValueOnce(failure);
    const handler = createHandler(mediaClient, metrics, sequence(FIRST_ID));

    await expect(
      handler.handle(video("movie.mp4", Buffer.from("x")))
    ).rejects.toBe(failure);
    expect(mediaClient.calls).toEqual([]);
  });

  it("tags the input asset with the delivery id and finds it again", async () => {
    const handler = createHandler(mediaClient, metrics, sequence(FIRST_ID));

    expect(await handler.findIngested("evt-movie")).toBeUndefined();
    await handler.handle(video("movie.mp4", Buffer.from("video"), "evt-movie"));

    expect(mediaClient.calls[1]).toEqual({
      op: "findAssetByAlternateId",
      alternateId: "evt-movie",
    });
    expect(mediaClient.calls).toContainEqual({
      op: "createAsset",
      name: "input-1b9d6bcdb",
      description: "Import - movie.mp4",
      alternateId: "evt-movie",
    });

    const existing = await handler.findIngested("evt-movie");
    expect(existing?.name).toBe("input-1b9d6bcdb");
    expect(await metrics.render()).toContain(
      'media_ingest_total{result="duplicate"} 1'
    );
  });

  it("releases the blob stream when ingest fails", async () => {
    mediaClient.failUpload = new Error("upload refused");
    const handler = createHandler(mediaClient, metrics, sequence(FIRST_ID));
    const blob = video("movie.mp4", Buffer.from("video"));

    await expect(handler.handle(blob)).rejects.toThrow("upload refused");
    expect(blob.content.destroyed).toBe(true);
  });
});
