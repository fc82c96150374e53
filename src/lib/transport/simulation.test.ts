import { describe, it, expect } from "vitest";
import { captureLogger } from "../../test-utils.js";
import { extract } from "../fields.js";
import { matchRoute, SimulationTransport } from "./simulation.js";

describe("matchRoute", () => {
  it("should return the transition list for transition reads", () => {
    const response = matchRoute({ method: "GET", endpoint: "issue/PROJ-1/transitions", apiVersion: "3" });
    expect(response.status).toBe(200);
    expect(extract(response.body, ".transitions[0].id")).toBe("21");
    expect(extract(response.body, ".transitions[2].to.name")).toBe("To Do");
  });

  it("should return an empty body for transition submissions", () => {
    expect(matchRoute({ method: "POST", endpoint: "issue/PROJ-1/transitions", apiVersion: "3" })).toEqual({
      status: 204,
      body: "",
    });
  });

  it("should return canned comment and worklog bodies", () => {
    const comment = matchRoute({ method: "POST", endpoint: "issue/PROJ-1/comment", apiVersion: "3" });
    expect(extract(comment.body, ".id")).toBe("10123");

    const worklog = matchRoute({ method: "POST", endpoint: "issue/PROJ-1/worklog", apiVersion: "3" });
    expect(extract(worklog.body, ".timeSpentSeconds")).toBe("9000");
    expect(extract(worklog.body, ".issue.fields.timeestimate")).toBe("14400");
  });

  it("should return the issue for everything else", () => {
    const issue = matchRoute({ method: "GET", endpoint: "issue/PROJ-1?expand=renderedFields", apiVersion: "3" });
    expect(extract(issue.body, ".key")).toBe("PROJ-123");

    // a comment read is not a comment submission
    const commentRead = matchRoute({ method: "GET", endpoint: "issue/PROJ-1/comment", apiVersion: "3" });
    expect(extract(commentRead.body, ".fields.summary")).toBe("Test Issue Summary");
  });
});

describe("SimulationTransport", () => {
  it("should log the request it would have sent", async () => {
    const captured = captureLogger();
    const transport = new SimulationTransport(captured.logger);

    await transport.send({
      method: "POST",
      endpoint: "issue/PROJ-1/transitions",
      body: { transition: { id: "21" } },
      apiVersion: "3",
    });

    expect(captured.stderr).toEqual([
      "ℹ️ INFO: [TEST MODE] Would execute request:",
      "ℹ️ INFO: Method: POST",
      "ℹ️ INFO: Endpoint: issue/PROJ-1/transitions",
      'ℹ️ INFO: Data: {"transition":{"id":"21"}}',
      "ℹ️ INFO: API Version: 3",
      "ℹ️ INFO: Full URL: https://example.atlassian.net/rest/api/3/issue/PROJ-1/transitions",
    ]);
    expect(captured.stdout).toEqual([]);
    expect(transport.requests).toHaveLength(1);
  });
});
