/**
 * Keyword tables for rule-based routing. Order is significant: the first
 * service (and the first operation type) with a substring hit wins.
 */

import type { KnownService, OperationType } from "../types.js";

export const SERVICE_KEYWORDS: ReadonlyArray<[KnownService, readonly string[]]> = [
  ["ec2", ["ec2", "instance", "server", "virtual machine", "vm", "compute"]],
  ["s3", ["s3", "storage", "bucket", "object", "file"]],
  ["rds", ["rds", "database", "db", "sql", "mysql", "postgresql", "aurora"]],
  ["lambda", ["lambda", "function", "serverless", "event-driven"]],
  ["vpc", ["vpc", "network", "subnet", "routing", "nat", "gateway"]],
];

export const LIFECYCLE_KEYWORDS: readonly string[] = ["start", "stop", "reboot", "restart", "terminate", "hibernate", "resume"];

export const OPERATION_KEYWORDS: ReadonlyArray<[OperationType, readonly string[]]> = [
  ["create", ["create", "launch", "start", "deploy", "provision", "set up", "setup"]],
  ["read", ["describe", "get", "list", "show", "display", "view"]],
  ["update", ["update", "modify", "change", "edit", "alter"]],
  ["delete", ["delete", "remove", "terminate", "destroy", "tear down"]],
  ["lifecycle", LIFECYCLE_KEYWORDS],
];

/** Words that anchor a lifecycle keyword to a machine */
export const MACHINE_NOUNS: readonly string[] = ["instance", "server", "machine"];

/** Max distance from a lifecycle keyword to the machine noun after it */
export const LIFECYCLE_PROXIMITY = 20;
