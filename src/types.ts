export const AUTH_STATES = ["UNVERIFIED", "AWAITING_CLIENT_CODE", "VERIFIED", "REJECTED"] as const;

export type AuthState = (typeof AUTH_STATES)[number];

export interface UserRecord {
  id: string;
  phone: string;
  clientCode: string;
  companyId: string;
  name: string;
  email: string;
  isActive: boolean;
  createdAt: string;
}

export type NewUser = Omit<UserRecord, "id" | "isActive" | "createdAt">;

interface SessionBase {
  senderAddress: string;
  lastUpdated: string;
}

export interface PendingSession extends SessionBase {
  authState: Exclude<AuthState, "VERIFIED">;
  userId: null;
}

export interface VerifiedSession extends SessionBase {
  authState: "VERIFIED";
  userId: string;
}

// userId is present exactly when the sender is verified.
export type Session = PendingSession | VerifiedSession;

export interface AgentResponse {
  replyText: string;
  notificationSent?: boolean;
  endSession?: boolean;
}

export interface HealthCheckResult {
  name: string;
  ok: boolean;
  details: string;
}
