import request from "supertest";
import { buildApp } from "../app";
import { PNG_BASE64, createTestContext, type TestContext } from "../test/helpers/generation";

describe("jobs API", () => {
  let harness: TestContext;

  function app() {
    return buildApp(harness.ctx);
  }

  async function submit(seed: number): Promise<string> {
    const res = await request(app()).post("/generate/async").send({ image: PNG_BASE64, seed });
    expect(res.status).toBe(202);
    return String(res.body.job_id);
  }

  afterEach(async () => {
    await harness.ctx.stop();
  });

  describe("with a running worker", () => {
    beforeEach(() => {
      harness = createTestContext({ watchdogIntervalMs: 40 });
      harness.ctx.start();
    });

    it("serves the two-job scenario end to end", async () => {
      const { ctx, engine } = harness;

      const first = await request(app()).post("/generate/async").send({ image: PNG_BASE64, seed: 1 });
      expect(first.status).toBe(202);
      expect(first.body).toEqual({
        job_id: expect.any(String),
        status: "queued",
        position: 0,
        status_url: `/status/${first.body.job_id}`,
      });
      const jobA = String(first.body.job_id);

      const second = await request(app()).post("/generate/async").send({ image: PNG_BASE64, seed: 2 });
      expect(second.status).toBe(202);
      expect(second.body.position).toBe(1);
      const jobB = String(second.body.job_id);

      await engine.nextCall();

      const runningA = await request(app()).get(`/status/${jobA}`);
      expect(runningA.status).toBe(200);
      expect(runningA.body).toMatchObject({
        job_id: jobA,
        status: "processing",
        position: 0,
        message: "Job is being processed",
        completed_at: null,
      });
      expect(typeof runningA.body.started_at).toBe("string");

      const waitingB = await request(app()).get(`/status/${jobB}`);
      expect(waitingB.body).toMatchObject({
        status: "queued",
        position: 1,
        message: "Job is queued with 1 job(s) ahead",
        started_at: null,
      });

      engine.completeNext();
      await ctx.store.whenSettled(jobA);
      await engine.nextCall();

      const doneA = await request(app()).get(`/status/${jobA}`);
      expect(doneA.body).toMatchObject({
        job_id: jobA,
        status: "completed",
        position: 0,
        download_url: `/download/${jobA}`,
        format: "glb",
        vertices: 8,
        faces: 12,
      });
      expect(typeof doneA.body.processing_time).toBe("number");

      const runningB = await request(app()).get(`/status/${jobB}`);
      expect(runningB.body).toMatchObject({ status: "processing", position: 0 });

      const download = await request(app()).get(`/download/${jobA}`).responseType("blob");
      expect(download.status).toBe(200);
      expect(download.headers["content-type"]).toBe("model/gltf-binary");
      expect(download.headers["content-disposition"]).toBe('attachment; filename="model.glb"');
      expect(Buffer.from(download.body).toString("utf8")).toBe("mesh:1");

      const notReady = await request(app()).get(`/download/${jobB}`);
      expect(notReady.status).toBe(409);
      expect(notReady.body).toMatchObject({ code: "job_not_ready", status: "processing" });

      engine.completeNext();
      await ctx.store.whenSettled(jobB);
      expect(engine.maxActive).toBe(1);
    });

    it("returns identical bodies when a finished job is polled repeatedly", async () => {
      const { ctx, engine } = harness;
      const jobId = await submit(5);
      await engine.nextCall();
      engine.completeNext();
      await ctx.store.whenSettled(jobId);

      const polls = await Promise.all(
        [1, 2, 3].map(() => request(app()).get(`/status/${jobId}`))
      );
      expect(polls[1]?.body).toEqual(polls[0]?.body);
      expect(polls[2]?.body).toEqual(polls[0]?.body);
    });

    it("reports failed jobs with their cause and refuses the download", async () => {
      const { ctx, engine } = harness;
      const jobId = await submit(3);
      await engine.nextCall();
      engine.failNext("mesh extraction failed");
      await ctx.store.whenSettled(jobId);

      const status = await request(app()).get(`/status/${jobId}`);
      expect(status.body).toMatchObject({
        status: "failed",
        position: 0,
        error: "mesh extraction failed",
        failure_cause: "execution",
      });
      expect(status.body.download_url).toBeUndefined();

      const download = await request(app()).get(`/download/${jobId}`);
      expect(download.status).toBe(409);
      expect(download.body).toMatchObject({
        code: "job_not_ready",
        message: `Job ${jobId} failed and has no artifact.`,
      });
    });

    it("serves ply artifacts as octet streams", async () => {
      const { ctx, engine } = harness;
      const res = await request(app())
        .post("/generate/async")
        .send({ image: PNG_BASE64, seed: 4, output_format: "ply" });
      const jobId = String(res.body.job_id);
      await engine.nextCall();
      engine.completeNext();
      await ctx.store.whenSettled(jobId);

      const download = await request(app()).get(`/download/${jobId}`).responseType("blob");
      expect(download.headers["content-type"]).toBe("application/octet-stream");
      expect(download.headers["content-disposition"]).toBe('attachment; filename="model.ply"');
    });

    it("answers the synchronous endpoint with the encoded model", async () => {
      harness.engine.autoComplete = true;
      const res = await request(app()).post("/generate").send({ image: PNG_BASE64, seed: 8 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        job_id: expect.any(String),
        model_data: Buffer.from("mesh:8").toString("base64"),
        format: "glb",
        processing_time: expect.any(Number),
        vertices: 8,
        faces: 12,
      });
    });

    it("returns the artifact bytes from generate-file", async () => {
      harness.engine.autoComplete = true;
      const res = await request(app())
        .post("/generate-file")
        .send({ image: PNG_BASE64, seed: 6 })
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("model/gltf-binary");
      expect(Buffer.from(res.body).toString("utf8")).toBe("mesh:6");
    });

    it("reports a failed synchronous job", async () => {
      harness.engine.loaded = false;
      harness.engine.loadError = new Error("model_not_loaded");
      const res = await request(app()).post("/generate").send({ image: PNG_BASE64 });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        job_id: expect.any(String),
        error: "model_not_loaded",
      });
    });

    it("reports health and queue counts", async () => {
      const health = await request(app()).get("/health");
      expect(health.status).toBe(200);
      expect(health.body).toEqual({
        status: "healthy",
        model_loaded: true,
        worker_alive: true,
        worker_restarts: 0,
      });

      await submit(1);
      await submit(2);
      await harness.engine.nextCall();

      const queue = await request(app()).get("/queue");
      expect(queue.body).toEqual({
        queued: 1,
        processing: 1,
        max_queue_size: 10,
        max_concurrent: 1,
      });

      harness.engine.completeNext();
      await harness.engine.nextCall();
      harness.engine.completeNext();
      await vi.waitFor(() => expect(harness.ctx.store.stats().processingCount).toBe(0));
    });
  });

  describe("with a short synchronous timeout", () => {
    beforeEach(() => {
      harness = createTestContext({ syncWaitTimeoutMs: 50 });
      harness.ctx.start();
    });

    it("times out the wait but leaves the job running", async () => {
      const res = await request(app()).post("/generate").send({ image: PNG_BASE64 });

      expect(res.status).toBe(504);
      expect(res.body).toMatchObject({
        code: "timeout",
        job_id: expect.any(String),
        status_url: `/status/${res.body.job_id}`,
      });
      const jobId = String(res.body.job_id);
      expect(harness.ctx.store.get(jobId)?.status).toBe("processing");

      await harness.engine.nextCall();
      harness.engine.completeNext();
      await expect(harness.ctx.store.whenSettled(jobId)).resolves.toMatchObject({
        status: "completed",
      });
    });
  });

  describe("without a worker", () => {
    beforeEach(() => {
      harness = createTestContext({ maxQueueDepth: 1 });
    });

    it("rejects submissions once the queue is full", async () => {
      await submit(1);
      const res = await request(app()).post("/generate/async").send({ image: PNG_BASE64 });

      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({
        code: "queue_full",
        queue_length: 1,
        max_queue_size: 1,
      });
      expect(harness.ctx.store.size).toBe(1);
    });

    it("rejects invalid submissions", async () => {
      const missing = await request(app()).post("/generate/async").send({ seed: 1 });
      expect(missing.status).toBe(400);
      expect(missing.body).toMatchObject({
        code: "validation_error",
        message: "Need image or image_url",
      });

      const malformed = await request(app())
        .post("/generate/async")
        .set("Content-Type", "application/json")
        .send("{not json");
      expect(malformed.status).toBe(400);
      expect(malformed.body).toMatchObject({ code: "invalid_json" });
      expect(harness.ctx.store.size).toBe(0);
    });

    it("answers unknown jobs with not_found", async () => {
      const status = await request(app()).get("/status/does-not-exist");
      expect(status.status).toBe(404);
      expect(status.body).toMatchObject({ code: "not_found" });

      const download = await request(app()).get("/download/does-not-exist");
      expect(download.status).toBe(404);
    });

    it("refuses to download a queued job", async () => {
      const jobId = await submit(1);
      const res = await request(app()).get(`/download/${jobId}`);

      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({
        code: "job_not_ready",
        message: `Job ${jobId} is not completed yet.`,
        status: "queued",
      });
    });

    it("reports degraded health while nothing is running", async () => {
      const res = await request(app()).get("/health");
      expect(res.body).toEqual({
        status: "degraded",
        model_loaded: false,
        worker_alive: false,
        worker_restarts: 0,
      });
    });
  });
});
