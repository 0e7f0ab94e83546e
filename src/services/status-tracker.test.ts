import assert from "node:assert/strict";
import test from "node:test";
import { DeploySubject } from "../types";
import {
  cloneConnStatus,
  createConnStatus,
  createSubjectStatus,
  getSubjectStatus,
  resetDeployFlags,
  withSubjectStatus,
} from "./status-tracker";

const DONE = {
  deployArchiveCopied: true,
  deployArchiveExtracted: true,
  deployArchiveTested: true,
  deployed: true,
  running: true,
};

test("getSubjectStatus creates an all-false record for untouched subjects", () => {
  assert.deepEqual(getSubjectStatus(createConnStatus(true, "Linux"), DeploySubject.Agent), createSubjectStatus());
});

test("withSubjectStatus returns a new status and leaves the old one alone", () => {
  const before = createConnStatus(true, "Linux");
  const after = withSubjectStatus(before, DeploySubject.Agent, DONE);

  assert.deepEqual(before.subjects, {});
  assert.deepEqual(getSubjectStatus(after, DeploySubject.Agent), DONE);
});

test("cloneConnStatus copies subject records", () => {
  const status = withSubjectStatus(createConnStatus(true, "Linux"), DeploySubject.Agent, DONE);
  const copy = cloneConnStatus(status);

  const agent = copy.subjects[DeploySubject.Agent];
  assert.ok(agent);
  agent.running = false;

  assert.equal(getSubjectStatus(status, DeploySubject.Agent).running, true);
});

test("resetDeployFlags clears deploy flags only", () => {
  assert.deepEqual(resetDeployFlags(DONE), {
    deployArchiveCopied: false,
    deployArchiveExtracted: false,
    deployArchiveTested: false,
    deployed: false,
    running: true,
  });
});
