/**
 * Tools registry and handlers
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ErrorCode, ValidationError } from '../errors/index.js';
import { MAX_TOTAL_VFS } from '../sriov/config.js';
import type { PlanLogger } from '../sriov/plan.js';
import {
  DeriveVfNamesArgsSchema,
  GetVerificationStateArgsSchema,
  PlanSriovReconciliationArgsSchema,
  ToolName,
  ValidateEthernetInterfaceArgsSchema,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import { planSriov } from './plan-sriov.js';
import { validateEthernetInterface } from './validate-interface.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';
import { getVerificationState } from './verification-state.js';
import { deriveVfNames } from './vf-names.js';

const INTERFACE_DOCUMENT_PROPERTY = {
  type: 'object',
  description:
    'Interface document: name, type "ethernet", state (up|down|absent) and an optional ethernet subtree with auto-negotiation, speed, duplex and sr-iov (total-vfs, vfs)',
};

export function listAllTools(): ToolDescriptor[] {
  return [
    {
      name: ToolName.VALIDATE_ETHERNET_INTERFACE,
      description:
        'Validate an ethernet interface document the way it is checked before an edit. Stops at the first invalid field and reports it; otherwise returns the canonical document.',
      inputSchema: {
        type: 'object',
        properties: {
          interface: INTERFACE_DOCUMENT_PROPERTY,
        },
        required: ['interface'],
      },
    },
    {
      name: ToolName.PLAN_SRIOV_RECONCILIATION,
      description:
        'Merge the current PF state into the desired one and preview the SR-IOV pass: generated VF interfaces, VF interfaces deleted because total-vfs decreased, and VF entries dropped beyond total-vfs.',
      inputSchema: {
        type: 'object',
        properties: {
          desired: INTERFACE_DOCUMENT_PROPERTY,
          current: {
            ...INTERFACE_DOCUMENT_PROPERTY,
            description: 'Optional: the PF as currently observed',
          },
        },
        required: ['desired'],
      },
    },
    {
      name: ToolName.GET_VERIFICATION_STATE,
      description:
        'Build the snapshot compared against live state after apply: VF MACs upper-cased, speed/duplex dropped under auto-negotiation, and no state for generated VFs.',
      inputSchema: {
        type: 'object',
        properties: {
          interface: INTERFACE_DOCUMENT_PROPERTY,
          generated: {
            type: 'boolean',
            description: 'Treat the interface as a generated VF (default: false)',
          },
        },
        required: ['interface'],
      },
    },
    {
      name: ToolName.DERIVE_VF_NAMES,
      description:
        'Derive the VF interface names of a PF, including the Broadcom "np<port>" naming exception.',
      inputSchema: {
        type: 'object',
        properties: {
          pfName: {
            type: 'string',
            description: 'PF interface name, e.g. "ens2f0np0"',
          },
          totalVfs: {
            type: 'number',
            description: 'Number of VFs',
            minimum: 0,
            maximum: MAX_TOTAL_VFS,
          },
          fromIndex: {
            type: 'number',
            description: 'Optional: first VF index (default: 0)',
            minimum: 0,
          },
        },
        required: ['pfName', 'totalVfs'],
      },
    },
  ];
}

const TOOL_NAMES: ReadonlySet<string> = new Set<string>(Object.values(ToolName));

export function isValidToolName(name: string): name is ToolName {
  return TOOL_NAMES.has(name);
}

function textResponse(payload: unknown, isError = false): ToolCallResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

function runTool<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  args: unknown,
  handler: (args: T) => unknown
): ToolCallResponse {
  const validation = validateToolArgs(schema, args ?? {});
  if (!validation.success) {
    return textResponse(
      {
        error: 'Invalid tool arguments',
        code: ErrorCode.TOOL_INVALID_INPUT,
        details: formatValidationErrors(validation.errors),
      },
      true
    );
  }

  try {
    return textResponse(handler(validation.data));
  } catch (error) {
    if (error instanceof ValidationError) {
      return textResponse(
        {
          error: 'Invalid interface',
          code: error.code,
          field: error.field,
          reason: error.reason,
          path: error.path,
        },
        true
      );
    }
    throw error;
  }
}

/**
 * Call a tool by name. Argument and interface validation failures come back
 * as error results; anything else propagates.
 */
export function callTool(name: string, args: unknown, logger?: PlanLogger): ToolCallResponse {
  if (!isValidToolName(name)) {
    return textResponse(
      {
        error: `Unknown tool: ${name}`,
        code: ErrorCode.TOOL_NOT_FOUND,
        availableTools: listAllTools().map((tool) => tool.name),
      },
      true
    );
  }

  switch (name) {
    case ToolName.VALIDATE_ETHERNET_INTERFACE:
      return runTool(ValidateEthernetInterfaceArgsSchema, args, validateEthernetInterface);
    case ToolName.PLAN_SRIOV_RECONCILIATION:
      return runTool(PlanSriovReconciliationArgsSchema, args, (parsed) => planSriov(parsed, logger));
    case ToolName.GET_VERIFICATION_STATE:
      return runTool(GetVerificationStateArgsSchema, args, getVerificationState);
    case ToolName.DERIVE_VF_NAMES:
      return runTool(DeriveVfNamesArgsSchema, args, deriveVfNames);
  }
}
