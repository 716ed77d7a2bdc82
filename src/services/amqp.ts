import { connect, Channel } from "amqplib";
import type { ProvisioningEvent, ResultPublisher } from "../types/events";
import logger from "../lib/logger";

const log = logger.child("amqp");

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

export type AmqpServiceOptions = {
  url: string;
  resultsExchange: string;
  agentId: string;
  connectAttempts: number;
  retryDelayMs?: number;
};

export type ProvisioningResultMessage = {
  agentId: string;
  ok: boolean;
  result?: unknown;
  error?: string;
  code?: string;
  stage?: string;
  containerId?: number;
  finishedAt: string;
};

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function routingKeyFor(event: ProvisioningEvent): string {
  return event.ok ? "provision.completed" : "provision.failed";
}

export function toResultMessage(event: ProvisioningEvent, agentId: string, now = new Date()): ProvisioningResultMessage {
  if (event.ok) {
    return {
      agentId,
      ok: true,
      result: event.result,
      containerId: event.result.id,
      finishedAt: now.toISOString(),
    };
  }
  return {
    agentId,
    ok: false,
    error: event.error.message,
    code: event.error.code,
    stage: event.error.stage,
    containerId: event.error.containerId,
    finishedAt: now.toISOString(),
  };
}

/**
 * Publishes the outcome of a run to the results exchange. Connects lazily,
 * with a bounded number of attempts: a CLI run must not hang on the broker.
 */
export class AmqpService implements ResultPublisher {
  private conn?: AmqpConnection;
  private ch?: Channel;
  private connectPromise?: Promise<Channel>;
  private shuttingDown = false;

  constructor(private readonly options: AmqpServiceOptions) {}

  async publishResult(event: ProvisioningEvent): Promise<void> {
    const ch = await this.ensureChannel();
    const routingKey = routingKeyFor(event);
    const payload = toResultMessage(event, this.options.agentId);
    log.debug("publishing result", { routingKey, payload });
    ch.publish(this.options.resultsExchange, routingKey, Buffer.from(JSON.stringify(payload)), {
      contentType: "application/json",
      deliveryMode: 2,
      correlationId: payload.containerId !== undefined ? String(payload.containerId) : undefined,
    });
  }

  async close(): Promise<void> {
    this.shuttingDown = true;
    await this.ch?.close();
    await this.conn?.close();
    this.ch = undefined;
    this.conn = undefined;
  }

  private ensureChannel(): Promise<Channel> {
    if (this.ch) return Promise.resolve(this.ch);
    if (!this.connectPromise) {
      this.connectPromise = this.connectWithRetry().finally(() => {
        this.connectPromise = undefined;
      });
    }
    return this.connectPromise;
  }

  private async connectWithRetry(): Promise<Channel> {
    const attempts = Math.max(1, this.options.connectAttempts);
    const delayMs = this.options.retryDelayMs ?? 1000;
    let lastErr: unknown;

    for (let attempt = 1; attempt <= attempts && !this.shuttingDown; attempt++) {
      try {
        return await this.createConnection();
      } catch (err) {
        lastErr = err;
        log.warn("failed to connect to AMQP", { err, attempt, attempts });
        if (attempt < attempts) await wait(delayMs);
      }
    }
    throw lastErr instanceof Error ? lastErr : new Error("AMQP connection unavailable");
  }

  private async createConnection(): Promise<Channel> {
    log.debug("connecting to AMQP", { exchange: this.options.resultsExchange });
    const conn = await connect(this.options.url);
    this.conn = conn;
    conn.on("error", (err: unknown) => {
      if (this.shuttingDown) return;
      log.warn("AMQP connection error", { err });
    });
    conn.on("close", () => {
      this.ch = undefined;
      this.conn = undefined;
    });

    try {
      const ch = await conn.createChannel();
      await ch.assertExchange(this.options.resultsExchange, "topic", { durable: true });
      this.ch = ch;
      return ch;
    } catch (err) {
      await conn.close().catch((closeErr: unknown) => log.debug("closing half-open connection failed", { err: closeErr }));
      throw err;
    }
  }
}
