/**
 * Guard and audit seams around tool execution.
 *
 * - ToolGuard: runs before and after every tool call (block a call, redact
 *   or rewrite its result)
 * - AuditSink: receives one structured event per executed call
 *
 * The defaults allow everything and discard events.
 */
import type { ToolResult } from '@loomwork/shared';

// ---------------------------------------------------------------------------
// Guard
// ---------------------------------------------------------------------------

export interface ToolGuardContext {
  projectId: string;
  toolName: string;
  callId: string;
  /** Parsed, not yet validated, arguments */
  toolInput: Record<string, unknown>;
}

export interface ToolGuardDecision {
  allow: boolean;
  /** Shown to the model when the call is blocked */
  reason?: string;
}

export interface ToolGuard {
  /** Return { allow: false } to block the call; the handler is then never run. */
  beforeToolExecution(ctx: ToolGuardContext): Promise<ToolGuardDecision>;
  /** May replace the result the model will see. */
  afterToolExecution(ctx: ToolGuardContext, result: ToolResult): Promise<ToolResult>;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export interface ToolAuditEvent {
  timestamp: string;
  action: 'executed' | 'blocked' | 'rejected';
  projectId: string;
  toolName: string;
  success: boolean;
  durationMs: number;
  error?: string;
}

export interface AuditSink {
  emit(event: ToolAuditEvent): void;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const allowAllGuard: ToolGuard = {
  async beforeToolExecution() {
    return { allow: true };
  },
  async afterToolExecution(_ctx, result) {
    return result;
  },
};

export const noopAuditSink: AuditSink = {
  emit() {},
};
