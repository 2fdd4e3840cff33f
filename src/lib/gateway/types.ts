export type GatewaySession = {
  key: string;
  kind: string;
  displayName?: string;
};

/** Black-box RPC port to the main agent's gateway. */
export interface AgentGateway {
  readonly connected: boolean;
  listSessions(): Promise<GatewaySession[]>;
  sendMessage(sessionKey: string, text: string): Promise<void>;
  abortRun(sessionKey: string): Promise<void>;
}

export type GatewayEvent = {
  eventType: string;
  stream: string;
  runId: string;
  seq: number;
  sessionKey: string;
  data: Record<string, unknown>;
};
