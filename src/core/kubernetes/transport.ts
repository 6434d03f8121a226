/**
 * Transport for synthesized requests.
 *
 * The library itself only builds {@link RequestSpec}s. Anything that can send
 * one and hand back the raw response can act as a transport; the default one
 * takes the cluster address and credentials from a KubeConfig and sends the
 * request with Node's http/https modules.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';
import { type RequestSpec, requestUri } from '../request/request-spec.js';
import { KubernetesApiResponseError, parseStatus } from './errors.js';

export interface TransportResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface RequestTransport {
  send(request: RequestSpec): Promise<TransportResponse>;
}

/**
 * Connection settings read from the environment by {@link KubeConfigTransport.fromEnv}
 */
export interface TransportEnvConfig {
  /**
   * Environment variable: KUBERNETES_API_SERVER
   */
  apiServer: string;
  /**
   * Bearer token. Environment variable: KUBERNETES_API_TOKEN
   */
  apiToken: string;
  /**
   * Base64 encoded CA certificate. Environment variable: KUBERNETES_CA_CERT
   */
  caCert?: string;
  /**
   * Disables TLS certificate verification; never use against production clusters.
   * Environment variable: KUBERNETES_SKIP_TLS_VERIFY
   *
   * @default false
   */
  skipTLSVerify: boolean;
}

const logger = getComponentLogger('kubeconfig-transport');

export function loadTransportConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TransportEnvConfig {
  const apiServer = env.KUBERNETES_API_SERVER;
  const apiToken = env.KUBERNETES_API_TOKEN;
  const caCert = env.KUBERNETES_CA_CERT;
  const skipTLSVerify = env.KUBERNETES_SKIP_TLS_VERIFY === 'true';

  if (!apiServer) {
    throw new Error('KUBERNETES_API_SERVER environment variable is not set.');
  }
  if (!apiToken) {
    throw new Error('KUBERNETES_API_TOKEN environment variable is not set.');
  }

  if (apiServer.startsWith('http://')) {
    if (!skipTLSVerify) {
      throw new Error(
        `KUBERNETES_API_SERVER ${apiServer} uses plain HTTP; set KUBERNETES_SKIP_TLS_VERIFY=true to allow unencrypted connections.`
      );
    }
    logger.warn('Connecting to HTTP endpoint - connection is not encrypted', {
      security: 'insecure-connection',
      apiServer,
    });
  } else if (skipTLSVerify) {
    logger.warn('TLS verification disabled via KUBERNETES_SKIP_TLS_VERIFY', {
      security: 'tls-disabled',
      apiServer,
      hasCaCert: Boolean(caCert),
    });
  } else if (!caCert) {
    logger.info('No custom CA certificate configured - using system trust store', {
      security: 'tls-configuration-info',
      apiServer,
    });
  }

  return {
    apiServer,
    apiToken,
    ...(caCert ? { caCert } : {}),
    skipTLSVerify,
  };
}

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      flat[key] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return flat;
}

export class KubeConfigTransport implements RequestTransport {
  constructor(private readonly kubeConfig: k8s.KubeConfig) {}

  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubeConfigTransport {
    return new KubeConfigTransport(kubeConfig);
  }

  /**
   * Use the kubeconfig resolved from KUBECONFIG, ~/.kube/config or the
   * in-cluster service account
   */
  static fromDefault(): KubeConfigTransport {
    const kubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromDefault();
    return new KubeConfigTransport(kubeConfig);
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): KubeConfigTransport {
    const config = loadTransportConfigFromEnv(env);
    const kubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromOptions({
      clusters: [
        {
          name: 'default-cluster',
          server: config.apiServer,
          skipTLSVerify: config.skipTLSVerify,
          ...(config.caCert !== undefined ? { caData: config.caCert } : {}),
        },
      ],
      users: [{ name: 'default-user', token: config.apiToken }],
      contexts: [{ name: 'default-context', cluster: 'default-cluster', user: 'default-user' }],
      currentContext: 'default-context',
    });
    return new KubeConfigTransport(kubeConfig);
  }

  async send(request: RequestSpec): Promise<TransportResponse> {
    const cluster = this.kubeConfig.getCurrentCluster();
    if (!cluster) {
      throw new Error('No current cluster configured in kubeconfig');
    }

    const uri = requestUri(request);
    // Server URLs may carry a path prefix.
    const url = new URL(`${cluster.server.replace(/\/+$/, '')}${uri}`);
    const isHttps = url.protocol === 'https:';

    const headers: http.OutgoingHttpHeaders = { Accept: 'application/json' };
    if (request.body !== undefined) {
      headers['Content-Type'] = request.contentType;
      headers['Content-Length'] = request.body.byteLength;
    }

    const options: https.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: `${url.pathname}${url.search}`,
      method: request.method,
      headers,
    };
    await this.kubeConfig.applyToHTTPSOptions(options);

    const requestLogger = logger.child({ method: request.method, uri });
    requestLogger.debug('Sending request');

    const response = await new Promise<TransportResponse>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });
        res.on('error', reject);
        res.on('end', () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            headers: flattenHeaders(res.headers),
            body: Buffer.concat(chunks),
          });
        });
      };

      const req = isHttps ? https.request(options, onResponse) : http.request(options, onResponse);

      req.on('error', reject);

      if (request.body !== undefined) {
        req.write(request.body);
      }
      req.end();
    });

    if (response.statusCode >= 400) {
      const error = new KubernetesApiResponseError(
        response.statusCode,
        request.method,
        uri,
        parseStatus(response.body)
      );
      requestLogger.error('Request failed', error, { statusCode: response.statusCode });
      throw error;
    }

    requestLogger.debug('Request completed', { statusCode: response.statusCode });
    return response;
  }
}
