/**
 * Canned Jira Cloud responses returned in test mode
 */

import { textDocument } from "../jira/document.js";

export const TRANSITIONS_RESPONSE = {
  transitions: [
    { id: "21", name: "Done", to: { name: "Done", id: "3" } },
    { id: "11", name: "In Progress", to: { name: "In Progress", id: "2" } },
    { id: "31", name: "To Do", to: { name: "To Do", id: "1" } },
  ],
};

export const COMMENT_RESPONSE = {
  id: "10123",
  created: "2024-01-16T15:30:45.123Z",
  updated: "2024-01-16T15:30:45.123Z",
  author: { displayName: "Test User" },
  body: textDocument("This is a test comment"),
};

export const WORKLOG_RESPONSE = {
  id: "10456",
  created: "2024-01-16T16:15:30.456Z",
  updated: "2024-01-16T16:15:30.456Z",
  author: { displayName: "Test User", emailAddress: "test@example.com" },
  timeSpent: "2h 30m",
  timeSpentSeconds: 9000,
  comment: textDocument("Development work completed"),
  issue: { fields: { timeestimate: 14400 } },
};

const DESCRIPTION =
  "This is a test issue description that demonstrates how the tool formats and displays JIRA issue information.";

export const ISSUE_RESPONSE = {
  key: "PROJ-123",
  fields: {
    summary: "Test Issue Summary",
    status: { name: "In Progress" },
    assignee: { displayName: "John Doe" },
    reporter: { displayName: "Jane Smith" },
    issuetype: { name: "Story" },
    priority: { name: "High" },
    created: "2024-01-15T10:30:00.000Z",
    updated: "2024-01-16T14:45:00.000Z",
    description: DESCRIPTION,
    customfield_10016: 5,
  },
  renderedFields: {
    description: DESCRIPTION,
  },
};
