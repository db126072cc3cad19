/**
 * MCP tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { MAX_TOTAL_VFS } from '../sriov/config.js';

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
}

export type ToolCallResponse = CallToolResult;

// Interface documents are only checked for being objects here; their shape is
// the document codec's business
const InterfaceDocumentArgSchema = z.record(z.string(), z.unknown());

export const ValidateEthernetInterfaceArgsSchema = z.object({
  interface: InterfaceDocumentArgSchema,
});

export type ValidateEthernetInterfaceArgs = z.infer<typeof ValidateEthernetInterfaceArgsSchema>;

export const PlanSriovReconciliationArgsSchema = z.object({
  desired: InterfaceDocumentArgSchema,
  current: InterfaceDocumentArgSchema.optional(),
});

export type PlanSriovReconciliationArgs = z.infer<typeof PlanSriovReconciliationArgsSchema>;

export const GetVerificationStateArgsSchema = z.object({
  interface: InterfaceDocumentArgSchema,
  generated: z.boolean().optional().default(false),
});

export type GetVerificationStateArgs = z.infer<typeof GetVerificationStateArgsSchema>;

export const DeriveVfNamesArgsSchema = z.object({
  pfName: z.string().min(1),
  totalVfs: z.number().int().min(0).max(MAX_TOTAL_VFS),
  fromIndex: z.number().int().min(0).optional().default(0),
});

export type DeriveVfNamesArgs = z.infer<typeof DeriveVfNamesArgsSchema>;

export enum ToolName {
  VALIDATE_ETHERNET_INTERFACE = 'validate_ethernet_interface',
  PLAN_SRIOV_RECONCILIATION = 'plan_sriov_reconciliation',
  GET_VERIFICATION_STATE = 'get_verification_state',
  DERIVE_VF_NAMES = 'derive_vf_names',
}
