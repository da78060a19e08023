import request from "supertest";
import { describe, it, expect } from "vitest";
import app, { createApp } from "@/app";
import { openDatabase } from "@/lib/db";

describe("health endpoints", () => {
  it("reports service status and echoes the request id", async () => {
    const res = await request(app)
      .get("/api/health")
      .set("X-Request-Id", "req-123");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("online");
    expect(res.body.mode).toBe("test");
    expect(res.headers["x-request-id"]).toBe("req-123");
    expect(res.headers["cache-control"]).toBe("no-store");
  });

  it("reports a reachable database", async () => {
    const res = await request(app).get("/api/health/db.json");

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });

  it("degrades to 503 when the database is closed", async () => {
    const handle = openDatabase(":memory:");
    handle.sqlite.close();

    const res = await request(createApp({ database: handle })).get(
      "/api/health/db",
    );

    expect(res.status).toBe(503);
    expect(res.body.ok).toBe(false);
    expect(res.body.error).toBe("Database health check failed");
  });

  it("checks XSRF before routing and 404s unknown reads", async () => {
    const res = await request(app).delete("/api/nothing-here");

    expect(res.status).toBe(403);
    expect(res.body.code).toBe("XSRF_TOKEN_INVALID");

    const read = await request(app).get("/api/nothing-here");
    expect(read.status).toBe(404);
    expect(read.body.code).toBe("ROUTE_NOT_FOUND");
  });
});
