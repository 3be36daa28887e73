import { getScan } from "../../src/application/query-scan/getScan.usecase";
import { NotFoundError, PersistenceError, ValidationError } from "../../src/core/errors";
import { InMemoryScanRepository } from "../support/InMemoryScanRepository";
import { makeResult, scanIdA, unknownScanId } from "../support/fixtures";

describe("getScan", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("renders the scan with its results in arrival order", async () => {
    const repo = new InMemoryScanRepository();
    repo.seed({
      _id: scanIdA,
      status: "COMPLETED",
      createdAt: new Date("2026-03-01T09:00:00.000Z"),
      startedAt: new Date("2026-03-01T09:01:00.000Z"),
      completedAt: new Date("2026-03-01T09:05:00.000Z"),
      dispatchedAt: new Date("2026-03-01T09:00:01.000Z"),
      results: [
        { id: 9, ...makeResult("hsts", { message: "missing", metadata: { header: "strict-transport-security" } }) },
        { id: 3, ...makeResult("csp", { passed: true, severity: "info" }) }
      ]
    });

    await expect(getScan({ repo }, scanIdA)).resolves.toEqual({
      id: scanIdA,
      target: "https://example.com",
      status: "COMPLETED",
      created_at: "2026-03-01T09:00:00.000Z",
      started_at: "2026-03-01T09:01:00.000Z",
      completed_at: "2026-03-01T09:05:00.000Z",
      results: [
        {
          id: 9,
          job_id: scanIdA,
          test_id: "hsts",
          test_name: "Check hsts",
          category: "headers",
          severity: "high",
          passed: false,
          message: "missing",
          reference: "",
          remediation: "",
          metadata: { header: "strict-transport-security" }
        },
        {
          id: 3,
          job_id: scanIdA,
          test_id: "csp",
          test_name: "Check csp",
          category: "headers",
          severity: "info",
          passed: true,
          message: "",
          reference: "",
          remediation: "",
          metadata: null
        }
      ]
    });
  });

  it("renders missing timestamps as null", async () => {
    const repo = new InMemoryScanRepository();
    repo.seed({ _id: scanIdA });

    const view = await getScan({ repo }, scanIdA);
    expect(view).toMatchObject({ status: "PENDING", started_at: null, completed_at: null, results: [] });
  });

  it("accepts an upper-case id", async () => {
    const repo = new InMemoryScanRepository();
    repo.seed({ _id: scanIdA });
    await expect(getScan({ repo }, scanIdA.toUpperCase())).resolves.toMatchObject({ id: scanIdA });
  });

  it("distinguishes a malformed id from an unknown one", async () => {
    const repo = new InMemoryScanRepository();
    await expect(getScan({ repo }, "abc")).rejects.toBeInstanceOf(ValidationError);
    await expect(getScan({ repo }, unknownScanId)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("wraps store failures", async () => {
    const repo = new InMemoryScanRepository();
    jest.spyOn(repo, "findById").mockRejectedValue(new Error("socket closed"));
    await expect(getScan({ repo }, scanIdA)).rejects.toThrow(
      new PersistenceError(`Store failed to load scan for scan ${scanIdA}: socket closed`)
    );
  });
});
