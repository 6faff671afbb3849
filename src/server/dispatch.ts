/**
 * Dispatch table
 *
 * The only place where environment and operation names are composed into
 * tool names. Multi-tenant servers expose every operation once per
 * environment (`preprod_list_jobs`, `mainnet_list_jobs`); single-tenant
 * servers expose each operation once, bound to the configured environment.
 */

import { ENVIRONMENT_IDS, EnvironmentId } from "../api/environments.js";
import { OPERATION_NAMES, OperationName } from "../api/operations.js";
import { TenancyMode } from "../api/types.js";

export const SERVER_INFO_TOOL = "get_server_info";
export const CONFIGURATION_TOOL = "get_configuration";
export const CONFIGURE_TOOL = "configure";

export type DispatchEntry =
  | { kind: "operation"; environment: EnvironmentId; operation: OperationName }
  | { kind: "server-info" }
  | { kind: "configuration" }
  | { kind: "configure" };

export type DispatchMode =
  | { tenancy: "multi-tenant" }
  | { tenancy: "single-tenant"; environment: EnvironmentId };

export function toolNameFor(tenancy: TenancyMode, environment: EnvironmentId, operation: OperationName): string {
  return tenancy === "multi-tenant" ? `${environment}_${operation}` : operation;
}

export function buildDispatchTable(mode: DispatchMode): Map<string, DispatchEntry> {
  const table = new Map<string, DispatchEntry>();

  if (mode.tenancy === "multi-tenant") {
    for (const environment of ENVIRONMENT_IDS) {
      for (const operation of OPERATION_NAMES) {
        table.set(toolNameFor(mode.tenancy, environment, operation), { kind: "operation", environment, operation });
      }
    }
    table.set(SERVER_INFO_TOOL, { kind: "server-info" });
    return table;
  }

  for (const operation of OPERATION_NAMES) {
    table.set(toolNameFor(mode.tenancy, mode.environment, operation), {
      kind: "operation",
      environment: mode.environment,
      operation,
    });
  }
  table.set(CONFIGURATION_TOOL, { kind: "configuration" });
  table.set(CONFIGURE_TOOL, { kind: "configure" });
  return table;
}

/**
 * Split a tool name shaped `<environment>_<operation>` whose operation part is
 * known. Used to tell "unknown environment" apart from "unknown tool".
 */
export function splitPrefixedToolName(name: string): { environment: string; operation: OperationName } | undefined {
  for (const operation of OPERATION_NAMES) {
    const suffix = `_${operation}`;
    if (name.length > suffix.length && name.endsWith(suffix)) {
      return { environment: name.substring(0, name.length - suffix.length), operation };
    }
  }
  return undefined;
}
