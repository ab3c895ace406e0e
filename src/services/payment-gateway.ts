import type { Amount } from "../utils/decimal.js";

export interface InitializeInput {
  email: string;
  amount: Amount;
  currency: string;
  reference: string;
  callbackUrl?: string;
  metadata?: Record<string, unknown>;
}

export interface GatewaySession {
  reference: string;
  authorizationUrl: string;
  accessCode: string;
}

export type GatewayPaymentStatus = "success" | "failed" | "pending";

export interface GatewayStatus {
  status: GatewayPaymentStatus;
  reference: string;
  gatewayId?: string;
  amountMinor?: number;
  currency?: string;
  gatewayResponse?: string;
  raw: unknown;
}

/** A signed notification whose signature has already been checked. */
export interface WebhookEvent {
  event: string;
  reference?: string;
  gatewayId?: string;
  amountMinor?: number;
  gatewayResponse?: string;
  raw: unknown;
}

export interface PaymentGateway {
  initialize(input: InitializeInput): Promise<GatewaySession>;
  verify(reference: string): Promise<GatewayStatus>;
  /** Throws InvalidSignatureError unless `signature` matches `rawBody`. */
  parseWebhook(rawBody: string, signature: string | undefined): WebhookEvent;
}
