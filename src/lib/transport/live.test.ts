import { describe, it, expect, vi } from "vitest";
import { JiraToolError } from "../errors.js";
import { captureLogger } from "../../test-utils.js";
import { LiveTransport, type FetchFn } from "./live.js";

const credentials = {
  baseUrl: "https://jira.test",
  email: "dev@example.com",
  apiToken: "test-secret",
};

function respondWith(status: number, body: string) {
  return vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => ({ status, text: async () => body }));
}

describe("LiveTransport", () => {
  it("should send an authenticated JSON request", async () => {
    const fetchFn = respondWith(201, '{"id":"1"}');
    const transport = new LiveTransport({ credentials, logger: captureLogger().logger, fetchFn });

    const response = await transport.send({
      method: "POST",
      endpoint: "issue/PROJ-1/comment",
      body: { body: "hi" },
      apiVersion: "3",
    });

    expect(response).toEqual({ status: 201, body: '{"id":"1"}' });
    expect(fetchFn).toHaveBeenCalledTimes(1);

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("https://jira.test/rest/api/3/issue/PROJ-1/comment");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"body":"hi"}');
    expect(init?.redirect).toBe("follow");
    expect(init?.headers).toEqual({
      Authorization: `Basic ${Buffer.from("dev@example.com:test-secret").toString("base64")}`,
      Accept: "application/json",
      "Content-Type": "application/json",
    });
  });

  it("should send no body for reads", async () => {
    const fetchFn = respondWith(200, "{}");
    const transport = new LiveTransport({ credentials, logger: captureLogger().logger, fetchFn });

    await transport.send({ method: "GET", endpoint: "issue/PROJ-1", apiVersion: "2" });

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("https://jira.test/rest/api/2/issue/PROJ-1");
    expect(init?.body).toBeUndefined();
  });

  it("should hand error statuses back to the caller", async () => {
    const transport = new LiveTransport({
      credentials,
      logger: captureLogger().logger,
      fetchFn: respondWith(404, '{"errorMessages":["Issue does not exist"]}'),
    });

    await expect(transport.send({ method: "GET", endpoint: "issue/PROJ-9", apiVersion: "3" })).resolves.toEqual({
      status: 404,
      body: '{"errorMessages":["Issue does not exist"]}',
    });
  });

  it("should fail with MissingCredentials before calling the network", async () => {
    const fetchFn = respondWith(200, "{}");
    const transport = new LiveTransport({
      credentials: { baseUrl: "https://jira.test" },
      logger: captureLogger().logger,
      fetchFn,
    });

    const failure = transport.send({ method: "GET", endpoint: "issue/PROJ-1", apiVersion: "3" });

    await expect(failure).rejects.toBeInstanceOf(JiraToolError);
    await expect(failure).rejects.toMatchObject({
      detail: { kind: "MissingCredentials", missing: ["JIRA_EMAIL", "JIRA_API_TOKEN"] },
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("should report connection errors as NetworkFailure", async () => {
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => {
      throw new Error("getaddrinfo ENOTFOUND jira.test");
    });
    const transport = new LiveTransport({ credentials, logger: captureLogger().logger, fetchFn });

    await expect(transport.send({ method: "GET", endpoint: "issue/PROJ-1", apiVersion: "3" })).rejects.toMatchObject({
      detail: {
        kind: "NetworkFailure",
        url: "https://jira.test/rest/api/3/issue/PROJ-1",
        cause: "getaddrinfo ENOTFOUND jira.test",
      },
    });
  });

  it("should abort requests that exceed the timeout", async () => {
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted.")));
        }),
    );
    const transport = new LiveTransport({ credentials, logger: captureLogger().logger, fetchFn, timeoutMs: 10 });

    await expect(transport.send({ method: "GET", endpoint: "issue/PROJ-1", apiVersion: "3" })).rejects.toMatchObject({
      detail: { kind: "NetworkFailure", cause: "timed out after 0.01s" },
    });
  });

  it("should log requests at debug level", async () => {
    const captured = captureLogger(true);
    const transport = new LiveTransport({ credentials, logger: captured.logger, fetchFn: respondWith(200, "{}") });

    await transport.send({ method: "GET", endpoint: "issue/PROJ-1", apiVersion: "3" });

    expect(captured.stderr).toEqual([
      "[debug] GET https://jira.test/rest/api/3/issue/PROJ-1",
      "[debug] GET https://jira.test/rest/api/3/issue/PROJ-1 -> 200",
    ]);
  });
});
