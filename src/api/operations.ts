/**
 * Operation handlers
 *
 * The six Sokosumi operations, independent of environment. Each one parses
 * its tool arguments up front (so bad input never reaches the network) and
 * then issues exactly one request through a client scoped to the call.
 */

import { ApiClientFactory, SokosumiApiClient, defaultApiClientFactory, withApiClient } from "./api-client.js";
import { CreateAgentJobRequest, JsonValue, ListJobsRequest } from "./types.js";
import {
  ToolArguments,
  validateJsonObject,
  validateNonEmptyString,
  validateNumber,
  validateString,
} from "../utils/validation.js";

export interface Operation<TRequest> {
  /** @throws InvalidRequestError */
  parse(args: ToolArguments): TRequest;
  execute(client: SokosumiApiClient, request: TRequest): Promise<JsonValue>;
}

const getUserInfo: Operation<void> = {
  parse: () => undefined,
  execute: (client) => client.getUserInfo(),
};

const listAgents: Operation<void> = {
  parse: () => undefined,
  execute: (client) => client.listAgents(),
};

const getAgentJobs: Operation<string> = {
  parse: (args) => validateNonEmptyString(args, "agent_id"),
  execute: (client, agentId) => client.getAgentJobs(agentId),
};

const listJobs: Operation<ListJobsRequest> = {
  parse(args) {
    const filters: ListJobsRequest = {};
    const status = validateString(args, "status", false);
    const agentId = validateString(args, "agent_id", false);
    // Empty filters are treated as absent rather than sent as "status="
    if (status) {
      filters.status = status;
    }
    if (agentId) {
      filters.agentId = agentId;
    }
    return filters;
  },
  execute: (client, filters) => client.listJobs(filters),
};

const getAgentInputSchema: Operation<string> = {
  parse: (args) => validateNonEmptyString(args, "agent_id"),
  execute: (client, agentId) => client.getAgentInputSchema(agentId),
};

const createAgentJob: Operation<CreateAgentJobRequest> = {
  parse: (args) => ({
    agentId: validateNonEmptyString(args, "agent_id"),
    inputData: validateJsonObject(args, "input_data"),
    maxAcceptedCredits: validateNumber(args, "max_accepted_credits", { required: true, min: 0 }),
  }),
  execute: (client, request) => client.createAgentJob(request),
};

export const OPERATIONS = {
  get_user_info: getUserInfo,
  list_agents: listAgents,
  get_agent_jobs: getAgentJobs,
  list_jobs: listJobs,
  get_agent_input_schema: getAgentInputSchema,
  create_agent_job: createAgentJob,
};

export type OperationName = keyof typeof OPERATIONS;

export const OPERATION_NAMES = Object.keys(OPERATIONS).filter(isOperationName);

export function isOperationName(value: string): value is OperationName {
  return Object.prototype.hasOwnProperty.call(OPERATIONS, value);
}

/**
 * Arguments validated, ready to run against any environment.
 */
export interface PreparedOperation {
  name: OperationName;
  run(client: SokosumiApiClient): Promise<JsonValue>;
}

function bind<TRequest>(name: OperationName, operation: Operation<TRequest>, args: ToolArguments): PreparedOperation {
  const request = operation.parse(args);
  return { name, run: (client) => operation.execute(client, request) };
}

/**
 * Validate tool arguments for an operation.
 * @throws InvalidRequestError
 */
export function prepareOperation(name: OperationName, args: ToolArguments): PreparedOperation {
  switch (name) {
    case "get_user_info":
      return bind(name, OPERATIONS.get_user_info, args);
    case "list_agents":
      return bind(name, OPERATIONS.list_agents, args);
    case "get_agent_jobs":
      return bind(name, OPERATIONS.get_agent_jobs, args);
    case "list_jobs":
      return bind(name, OPERATIONS.list_jobs, args);
    case "get_agent_input_schema":
      return bind(name, OPERATIONS.get_agent_input_schema, args);
    case "create_agent_job":
      return bind(name, OPERATIONS.create_agent_job, args);
  }
}

/**
 * Run a prepared operation with a client opened for this call only.
 */
export function executeOperation(
  prepared: PreparedOperation,
  baseUrl: string,
  apiKey: string,
  factory: ApiClientFactory = defaultApiClientFactory
): Promise<JsonValue> {
  return withApiClient(factory, baseUrl, apiKey, (client) => prepared.run(client));
}

/**
 * Validate, open a scoped client, issue the request, close the client.
 */
export async function runOperation(
  name: OperationName,
  baseUrl: string,
  apiKey: string,
  args: ToolArguments,
  factory: ApiClientFactory = defaultApiClientFactory
): Promise<JsonValue> {
  const prepared = prepareOperation(name, args);
  return await executeOperation(prepared, baseUrl, apiKey, factory);
}
