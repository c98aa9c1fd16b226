import { JobQueue, QueueTakeAbortedError } from "../jobs.queue";

describe("JobQueue", () => {
  it("delivers items in FIFO order", async () => {
    const queue = new JobQueue<string>(3);
    expect(queue.offer("a")).toBe(true);
    expect(queue.offer("b")).toBe(true);

    await expect(queue.take()).resolves.toBe("a");
    await expect(queue.take()).resolves.toBe("b");
    expect(queue.size).toBe(0);
  });

  it("refuses offers beyond capacity", () => {
    const queue = new JobQueue<string>(2);
    expect(queue.offer("a")).toBe(true);
    expect(queue.offer("b")).toBe(true);
    expect(queue.offer("c")).toBe(false);
    expect(queue.size).toBe(2);
  });

  it("hands an offered item straight to a waiting consumer", async () => {
    const queue = new JobQueue<string>(1);
    const taken = queue.take();
    expect(queue.waiting).toBe(1);

    expect(queue.offer("a")).toBe(true);
    await expect(taken).resolves.toBe("a");
    expect(queue.size).toBe(0);
    expect(queue.waiting).toBe(0);
  });

  it("rejects a pending take when aborted", async () => {
    const queue = new JobQueue<string>(1);
    const controller = new AbortController();
    const taken = queue.take(controller.signal);
    controller.abort();

    await expect(taken).rejects.toBeInstanceOf(QueueTakeAbortedError);
    expect(queue.waiting).toBe(0);

    queue.offer("a");
    expect(queue.size).toBe(1);
  });

  it("rejects a take on an already aborted signal", async () => {
    const queue = new JobQueue<string>(1);
    queue.offer("a");
    const controller = new AbortController();
    controller.abort();

    await expect(queue.take(controller.signal)).rejects.toThrow("queue_take_aborted");
    expect(queue.size).toBe(1);
  });

  it("requires a positive integer capacity", () => {
    expect(() => new JobQueue<string>(0)).toThrow("queue_capacity_invalid");
    expect(() => new JobQueue<string>(1.5)).toThrow("queue_capacity_invalid");
  });
});
