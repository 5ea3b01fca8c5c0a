import { readFileSync } from 'fs';
import { connect, IClientOptions, MqttClient } from 'mqtt';
import { MqttConfig } from '../config/loader.js';
import { logger } from '../logger.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface MqttClientEvents {
  connect: () => void;
  disconnect: () => void;
  reconnect: () => void;
  error: (err: Error) => void;
  message: (topic: string, payload: Buffer) => void;
}

const log = logger.child({ component: 'mqtt' });

export class MqttClientWrapper {
  private client: MqttClient | null = null;
  private config: MqttConfig;
  private subscriptions = new Set<string>();
  private state: ConnectionState = 'disconnected';
  private eventHandlers: Partial<MqttClientEvents> = {};

  constructor(config: MqttConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    this.state = 'connecting';
    const options = this.buildOptions();

    return new Promise((resolve, reject) => {
      const client = connect(options);
      this.client = client;

      client.on('connect', () => {
        this.state = 'connected';
        log.info({ host: this.config.host, port: this.config.port }, 'Connected to MQTT broker');
        this.resubscribe();
        this.eventHandlers.connect?.();
        resolve();
      });

      client.on('reconnect', () => {
        this.state = 'reconnecting';
        log.warn('Reconnecting to MQTT broker');
        this.eventHandlers.reconnect?.();
      });

      client.on('close', () => {
        this.state = 'disconnected';
        this.eventHandlers.disconnect?.();
      });

      client.on('error', (err) => {
        log.warn({ err }, 'Error from MQTT client');
        this.eventHandlers.error?.(err);
        if (this.state === 'connecting') {
          reject(err);
        }
      });

      client.on('message', (topic, payload) => {
        this.eventHandlers.message?.(topic, payload);
      });
    });
  }

  disconnect(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.client) {
        resolve();
        return;
      }

      this.client.end(false, {}, () => {
        this.client = null;
        this.state = 'disconnected';
        resolve();
      });
    });
  }

  /** Subscribes at QoS 1; topics are remembered and resubscribed on reconnect. */
  subscribeMany(topics: string[]): void {
    for (const topic of topics) {
      this.subscriptions.add(topic);
      log.info({ topic }, 'Subscribing to topic');
    }
    if (this.client && this.state === 'connected' && topics.length > 0) {
      this.sendSubscribe(topics);
    }
  }

  on<K extends keyof MqttClientEvents>(event: K, handler: MqttClientEvents[K]): void {
    this.eventHandlers[event] = handler;
  }

  getState(): ConnectionState {
    return this.state;
  }

  getSubscriptions(): string[] {
    return Array.from(this.subscriptions);
  }

  getBrokerUrl(): string {
    return `${this.protocol()}://${this.config.host}:${this.config.port}`;
  }

  private protocol(): 'mqtt' | 'mqtts' {
    return this.config.caFile ? 'mqtts' : 'mqtt';
  }

  private buildOptions(): IClientOptions {
    const options: IClientOptions = {
      host: this.config.host,
      port: this.config.port,
      protocol: this.protocol(),
      clientId: this.config.clientId,
      clean: true,
      reconnectPeriod: 5000,
    };

    if (this.config.keepAlive !== undefined) {
      options.keepalive = this.config.keepAlive;
    }
    if (this.config.connectTimeout !== undefined) {
      options.connectTimeout = this.config.connectTimeout * 1000;
    }

    const auth = this.config.auth;
    if (auth && 'username' in auth) {
      options.username = auth.username;
      options.password = auth.password;
    }
    if (this.config.caFile) {
      options.ca = readFileSync(this.config.caFile);
      if (auth && 'certFile' in auth) {
        options.cert = readFileSync(auth.certFile);
        options.key = readFileSync(auth.privateKeyFile);
      }
    }

    return options;
  }

  private sendSubscribe(topics: string[]): void {
    this.client?.subscribe(topics, { qos: 1 }, (err) => {
      if (err) {
        log.error({ err, topics }, 'Subscribe failed');
      }
    });
  }

  private resubscribe(): void {
    if (this.subscriptions.size > 0) {
      this.sendSubscribe(Array.from(this.subscriptions));
    }
  }
}

export function createMqttClient(config: MqttConfig): MqttClientWrapper {
  return new MqttClientWrapper(config);
}
