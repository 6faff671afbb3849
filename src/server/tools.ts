/**
 * MCP Tool Definitions
 *
 * Builds the tool schemas exposed by the Sokosumi MCP server from the
 * dispatch table, so the listed tools and the callable tools never diverge.
 */

import { Tool } from "@modelcontextprotocol/sdk/types.js";
import { EnvironmentId } from "../api/environments.js";
import { OperationName } from "../api/operations.js";
import { DispatchEntry, DispatchMode, buildDispatchTable } from "./dispatch.js";

type ToolTemplate = Omit<Tool, "name">;

const agentIdProperty = {
  type: "string",
  description: "The agent ID. Get this from list_agents.",
};

const OPERATION_TOOLS: Record<OperationName, ToolTemplate> = {
  get_user_info: {
    description:
      "Get the Sokosumi account that owns the API key. " +
      "Answers: 'Who am I logged in as?', 'Which account is this?'. " +
      "Returns: The user object exactly as the API sends it.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
    annotations: {
      readOnlyHint: true,
    },
  },
  list_agents: {
    description:
      "List all agents available to the account. " +
      "USE THIS FIRST to find agent IDs before fetching schemas or creating jobs. " +
      "Returns: Array of agents exactly as the API sends them.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
    annotations: {
      readOnlyHint: true,
    },
  },
  get_agent_jobs: {
    description:
      "Get the jobs of a specific agent. " +
      "Answers: 'What jobs has agent X run?', 'Show me this agent's history'. " +
      "REQUIRED: agent_id (get it from list_agents).",
    inputSchema: {
      type: "object",
      properties: {
        agent_id: agentIdProperty,
      },
      required: ["agent_id"],
    },
    annotations: {
      readOnlyHint: true,
    },
  },
  list_jobs: {
    description:
      "List jobs with optional filters. " +
      "Answers: 'Which jobs are still waiting for payment?', 'Show completed jobs for agent X'. " +
      "Both filters are optional; leave them out to list every job.",
    inputSchema: {
      type: "object",
      properties: {
        status: {
          type: "string",
          description: "Filter by job status (e.g., 'payment_pending', 'completed').",
        },
        agent_id: {
          type: "string",
          description: "Filter by agent ID.",
        },
      },
      required: [],
    },
    annotations: {
      readOnlyHint: true,
    },
  },
  get_agent_input_schema: {
    description:
      "Get the input schema of a specific agent. " +
      "USE BEFORE create_agent_job to learn what input_data the agent accepts. " +
      "REQUIRED: agent_id (get it from list_agents).",
    inputSchema: {
      type: "object",
      properties: {
        agent_id: agentIdProperty,
      },
      required: ["agent_id"],
    },
    annotations: {
      readOnlyHint: true,
    },
  },
  create_agent_job: {
    description:
      "Create a new job for an agent. This spends credits. " +
      "REQUIRED: agent_id, input_data matching the agent's input schema (see get_agent_input_schema), " +
      "and max_accepted_credits, the most the job may cost. " +
      "Returns: The created job exactly as the API sends it.",
    inputSchema: {
      type: "object",
      properties: {
        agent_id: agentIdProperty,
        input_data: {
          type: "object",
          description: "Input data for the job. Its shape is defined by the agent's input schema.",
        },
        max_accepted_credits: {
          type: "number",
          minimum: 0,
          description: "Maximum credits to spend on this job.",
        },
      },
      required: ["agent_id", "input_data", "max_accepted_credits"],
    },
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
    },
  },
};

const ENVIRONMENT_LABELS: Record<EnvironmentId, string> = {
  preprod: "[Preprod]",
  mainnet: "[Mainnet]",
};

const serverInfoTool: ToolTemplate = {
  description:
    "Get information about the server: the available environments and their base URLs, " +
    "and how to authenticate. Needs no API key.",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
  annotations: {
    readOnlyHint: true,
  },
};

const configurationTool: ToolTemplate = {
  description:
    "Get the current configuration: environment, base URL, and whether an API key is set. " +
    "Needs no API key.",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
  annotations: {
    readOnlyHint: true,
  },
};

const configureTool: ToolTemplate = {
  description:
    "Set the Sokosumi API key used by every following call. " +
    "Replaces any key set earlier, including SOKOSUMI_API_KEY.",
  inputSchema: {
    type: "object",
    properties: {
      api_key: {
        type: "string",
        description: "Your Sokosumi API key.",
      },
    },
    required: ["api_key"],
  },
  annotations: {
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true,
  },
};

function templateFor(entry: DispatchEntry, mode: DispatchMode): ToolTemplate {
  switch (entry.kind) {
    case "operation": {
      const template = OPERATION_TOOLS[entry.operation];
      if (mode.tenancy === "single-tenant") {
        return template;
      }
      return { ...template, description: `${ENVIRONMENT_LABELS[entry.environment]} ${template.description}` };
    }
    case "server-info":
      return serverInfoTool;
    case "configuration":
      return configurationTool;
    case "configure":
      return configureTool;
  }
}

export function buildTools(mode: DispatchMode): Tool[] {
  return [...buildDispatchTable(mode)].map(([name, entry]) => ({ name, ...templateFor(entry, mode) }));
}
