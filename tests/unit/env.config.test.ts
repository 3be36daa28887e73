import { isDebugMode, loadEnv } from "../../src/shared/config/env";

describe("env config", () => {
  it("falls back to local defaults", () => {
    expect(loadEnv({})).toEqual({
      MONGO_URI: "mongodb://localhost:27017/scans",
      MONGO_DB: "scans",
      REDIS_URL: "redis://localhost:6379",
      SCAN_QUEUE_NAME: "scan_queue",
      PORT: 8080
    });
  });

  it("reads explicit values", () => {
    expect(
      loadEnv({
        MONGO_URI: "mongodb+srv://cluster.example.net",
        MONGO_DB: " scanner ",
        REDIS_URL: "rediss://cache.example.net:6380",
        SCAN_QUEUE_NAME: "scans_v2",
        PORT: "0"
      })
    ).toEqual({
      MONGO_URI: "mongodb+srv://cluster.example.net",
      MONGO_DB: "scanner",
      REDIS_URL: "rediss://cache.example.net:6380",
      SCAN_QUEUE_NAME: "scans_v2",
      PORT: 0
    });
  });

  it.each([
    [{ MONGO_URI: "localhost:27017" }, "MONGO_URI must use one of mongodb:, mongodb+srv: schemes. Received: localhost:27017"],
    [{ MONGO_URI: "not a url" }, "MONGO_URI must be a valid absolute URL. Received: not a url"],
    [{ REDIS_URL: "http://cache:6379" }, "REDIS_URL must use one of redis:, rediss: schemes. Received: http://cache:6379"],
    [{ PORT: "70000" }, "PORT=70000 is out of allowed range [0..65535]"],
    [{ PORT: "eighty" }, "PORT=eighty is out of allowed range [0..65535]"]
  ])("rejects %p", (env, message) => {
    expect(() => loadEnv(env)).toThrow(message);
  });

  it.each([
    ["1", true],
    ["TRUE", true],
    ["0", false],
    [undefined, false]
  ])("treats DEBUG=%p as debug mode %p", (value, expected) => {
    expect(isDebugMode({ DEBUG: value })).toBe(expected);
  });
});
