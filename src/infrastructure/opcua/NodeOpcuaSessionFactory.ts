import {
  MessageSecurityMode,
  OPCUAClient,
  type EndpointDescription,
  type OPCUAClientOptions,
} from 'node-opcua-client';
import { describeError, TransportFault } from '../../domain/errors.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type {
  EndpointDescriptor,
  ISession,
  ISessionFactory,
  SessionOpenOptions,
} from '../../domain/ports/ISession.js';
import type { SecurityModeName } from '../config/Config.js';
import { NodeOpcuaSession } from './NodeOpcuaSession.js';

const SECURITY_POLICY_PREFIX = 'http://opcfoundation.org/UA/SecurityPolicy#';

const MESSAGE_SECURITY_MODES: Record<SecurityModeName, MessageSecurityMode> = {
  None: MessageSecurityMode.None,
  Sign: MessageSecurityMode.Sign,
  SignAndEncrypt: MessageSecurityMode.SignAndEncrypt,
};

export interface NodeOpcuaSessionFactoryOptions {
  applicationName: string;
  securityMode: SecurityModeName;
  /** Policy name, such as `None` or `Basic256Sha256` */
  securityPolicy: string;
}

function securityModeName(mode: MessageSecurityMode): SecurityModeName | null {
  switch (mode) {
    case MessageSecurityMode.None:
      return 'None';
    case MessageSecurityMode.Sign:
      return 'Sign';
    case MessageSecurityMode.SignAndEncrypt:
      return 'SignAndEncrypt';
    default:
      return null;
  }
}

async function withTimeout<T>(task: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Opens sessions with node-opcua. Every session gets a client of its own, and
 * the client's built-in reconnection is off: retries belong to the controller.
 */
export class NodeOpcuaSessionFactory implements ISessionFactory {
  private readonly logger: ILogger;

  constructor(
    private readonly options: NodeOpcuaSessionFactoryOptions,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'NodeOpcuaSessionFactory' });
  }

  private get securityPolicyUri(): string {
    return SECURITY_POLICY_PREFIX + this.options.securityPolicy;
  }

  private createClient(overrides: Partial<OPCUAClientOptions> = {}): OPCUAClient {
    return OPCUAClient.create({
      applicationName: this.options.applicationName,
      endpointMustExist: false,
      keepSessionAlive: false,
      connectionStrategy: { maxRetry: 0, initialDelay: 1000, maxDelay: 1000 },
      ...overrides,
    });
  }

  async selectEndpoint(endpointUrl: string, operationTimeout: number): Promise<EndpointDescriptor> {
    const client = this.createClient();
    let endpoints: EndpointDescription[];
    try {
      endpoints = await withTimeout(
        (async () => {
          await client.connect(endpointUrl);
          return client.getEndpoints();
        })(),
        operationTimeout,
        () => new TransportFault(`No answer from ${endpointUrl} within ${operationTimeout}ms`)
      );
    } catch (error) {
      if (error instanceof TransportFault) throw error;
      throw new TransportFault(`Unable to reach ${endpointUrl}: ${describeError(error)}`, { cause: error });
    } finally {
      await client.disconnect();
    }

    const wanted = MESSAGE_SECURITY_MODES[this.options.securityMode];
    const match = endpoints.find(
      (endpoint) => endpoint.securityMode === wanted && endpoint.securityPolicyUri === this.securityPolicyUri
    );
    const mode = match ? securityModeName(match.securityMode) : null;
    if (!match || mode === null) {
      throw new TransportFault(
        `No endpoint of ${endpointUrl} offers ${this.options.securityMode}/${this.options.securityPolicy}`
      );
    }

    this.logger.debug('Selected endpoint', {
      endpoint: match.endpointUrl ?? endpointUrl,
      securityMode: mode,
      securityPolicy: this.options.securityPolicy,
    });

    return {
      // keep the URL the caller dialled, not the advertised one
      endpointUrl,
      securityMode: mode,
      securityPolicyUri: this.securityPolicyUri,
    };
  }

  async openSession(endpoint: EndpointDescriptor, options: SessionOpenOptions): Promise<ISession> {
    const client = this.createClient({
      securityMode: MESSAGE_SECURITY_MODES[this.options.securityMode],
      securityPolicy: endpoint.securityPolicyUri,
      requestedSessionTimeout: options.sessionTimeout,
    });

    try {
      await client.connect(endpoint.endpointUrl);
      const session = await client.createSession();
      return new NodeOpcuaSession(
        client,
        session,
        endpoint.endpointUrl,
        options.keepAliveInterval,
        this.logger.child({ endpoint: endpoint.endpointUrl })
      );
    } catch (error) {
      await client.disconnect();
      throw new TransportFault(
        `Unable to open session on ${endpoint.endpointUrl}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}
