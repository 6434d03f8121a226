import * as http from 'node:http';
import * as k8s from '@kubernetes/client-node';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { bindResource } from '../../../src/core/kubernetes/api.js';
import { isNotFoundError, KubernetesApiResponseError } from '../../../src/core/kubernetes/errors.js';
import {
  KubeConfigTransport,
  loadTransportConfigFromEnv,
} from '../../../src/core/kubernetes/transport.js';
import { requestsFor } from '../../../src/core/request/request-spec.js';
import { customResource } from '../../../src/core/resource/index.js';

interface ReceivedRequest {
  method: string | undefined;
  url: string | undefined;
  authorization: string | undefined;
  contentType: string | undefined;
  body: string;
}

describe('KubeConfigTransport', () => {
  let server: http.Server;
  let serverUrl: string;
  let received: ReceivedRequest[] = [];

  const foos = customResource('Foo').group('clux.dev').version('v1').within('myns').build();
  const requests = requestsFor(foos);

  function createKubeConfig(server: string): k8s.KubeConfig {
    const kubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromOptions({
      clusters: [{ name: 'test-cluster', server, skipTLSVerify: true }],
      users: [{ name: 'test-user', token: 'test-token' }],
      contexts: [{ name: 'test-context', cluster: 'test-cluster', user: 'test-user' }],
      currentContext: 'test-context',
    });
    return kubeConfig;
  }

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        received.push({
          method: req.method,
          url: req.url,
          authorization: req.headers.authorization,
          contentType: req.headers['content-type'],
          body: Buffer.concat(chunks).toString('utf-8'),
        });

        // Stands in for the server closing the stream when timeoutSeconds expires.
        if (req.url?.includes('watch=true')) {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.write('{"type":"ADDED","object":{"kind":"Foo"}}\n');
          res.end();
          return;
        }

        if (req.url?.includes('/missing')) {
          res.writeHead(404, { 'Content-Type': 'application/json' });
          res.end(
            JSON.stringify({
              kind: 'Status',
              status: 'Failure',
              code: 404,
              reason: 'NotFound',
              message: 'foos.clux.dev "missing" not found',
            })
          );
          return;
        }

        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end('{"kind":"Foo"}');
      });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server is not listening on a TCP port');
    }
    serverUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    received = [];
  });

  it('sends the request with credentials from the kubeconfig', async () => {
    const transport = KubeConfigTransport.fromKubeConfig(createKubeConfig(serverUrl));
    const body = Buffer.from('{"spec":{"replicas":1}}', 'utf-8');

    const response = await transport.send(requests.patch('baz', { patch: 'merge', fieldManager: 'tests' }, body));

    expect(response.statusCode).toBe(200);
    expect(Buffer.from(response.body).toString('utf-8')).toBe('{"kind":"Foo"}');
    expect(response.headers['content-type']).toBe('application/json');
    expect(received).toEqual([
      {
        method: 'PATCH',
        url: '/apis/clux.dev/v1/namespaces/myns/foos/baz?fieldManager=tests',
        authorization: 'Bearer test-token',
        contentType: 'application/merge-patch+json',
        body: '{"spec":{"replicas":1}}',
      },
    ]);
  });

  it('keeps a path prefix on the server URL', async () => {
    const transport = KubeConfigTransport.fromKubeConfig(createKubeConfig(`${serverUrl}/proxy/`));

    await transport.send(requests.list());

    expect(received[0]?.url).toBe('/proxy/apis/clux.dev/v1/namespaces/myns/foos');
  });

  it('rejects error responses with the decoded Status', async () => {
    const transport = KubeConfigTransport.fromKubeConfig(createKubeConfig(serverUrl));

    const failure = await transport.send(requests.get('missing')).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(KubernetesApiResponseError);
    expect(isNotFoundError(failure)).toBe(true);
    if (failure instanceof KubernetesApiResponseError) {
      expect(failure.body?.reason).toBe('NotFound');
      expect(failure.uri).toBe('/apis/clux.dev/v1/namespaces/myns/foos/missing');
    }
  });

  it('resolves a bounded watch once the server closes the stream', async () => {
    const transport = KubeConfigTransport.fromKubeConfig(createKubeConfig(serverUrl));

    const response = await bindResource(foos, transport).watch({ timeoutSeconds: 1 });

    expect(received[0]?.url).toBe('/apis/clux.dev/v1/namespaces/myns/foos?watch=true&timeoutSeconds=1');
    expect(Buffer.from(response.body).toString('utf-8')).toBe('{"type":"ADDED","object":{"kind":"Foo"}}\n');
  });

  it('builds a transport from environment variables', async () => {
    const transport = KubeConfigTransport.fromEnv({
      KUBERNETES_API_SERVER: serverUrl,
      KUBERNETES_API_TOKEN: 'test-token',
      KUBERNETES_SKIP_TLS_VERIFY: 'true',
    });

    await transport.send(requests.get('baz'));

    expect(received[0]?.authorization).toBe('Bearer test-token');
    expect(received[0]?.method).toBe('GET');
  });
});

describe('loadTransportConfigFromEnv', () => {
  it('requires the API server', () => {
    expect(() => loadTransportConfigFromEnv({ KUBERNETES_API_TOKEN: 'test-token' })).toThrow(
      'KUBERNETES_API_SERVER environment variable is not set.'
    );
  });

  it('requires the API token', () => {
    expect(() => loadTransportConfigFromEnv({ KUBERNETES_API_SERVER: 'https://127.0.0.1:6443' })).toThrow(
      'KUBERNETES_API_TOKEN environment variable is not set.'
    );
  });

  it('refuses a plain HTTP server unless TLS verification is skipped', () => {
    expect(() =>
      loadTransportConfigFromEnv({
        KUBERNETES_API_SERVER: 'http://127.0.0.1:8080',
        KUBERNETES_API_TOKEN: 'test-token',
      })
    ).toThrow(
      'KUBERNETES_API_SERVER http://127.0.0.1:8080 uses plain HTTP; set KUBERNETES_SKIP_TLS_VERIFY=true to allow unencrypted connections.'
    );
    expect(() =>
      KubeConfigTransport.fromEnv({
        KUBERNETES_API_SERVER: 'http://127.0.0.1:8080',
        KUBERNETES_API_TOKEN: 'test-token',
        KUBERNETES_SKIP_TLS_VERIFY: 'false',
      })
    ).toThrow('uses plain HTTP');
  });

  it('accepts a plain HTTP server when TLS verification is skipped', () => {
    expect(
      loadTransportConfigFromEnv({
        KUBERNETES_API_SERVER: 'http://127.0.0.1:8080',
        KUBERNETES_API_TOKEN: 'test-token',
        KUBERNETES_SKIP_TLS_VERIFY: 'true',
      })
    ).toEqual({
      apiServer: 'http://127.0.0.1:8080',
      apiToken: 'test-token',
      skipTLSVerify: true,
    });
  });

  it('reads TLS settings', () => {
    expect(
      loadTransportConfigFromEnv({
        KUBERNETES_API_SERVER: 'https://127.0.0.1:6443',
        KUBERNETES_API_TOKEN: 'test-token',
        KUBERNETES_CA_CERT: 'dGVzdC1jYQ==',
        KUBERNETES_SKIP_TLS_VERIFY: 'true',
      })
    ).toEqual({
      apiServer: 'https://127.0.0.1:6443',
      apiToken: 'test-token',
      caCert: 'dGVzdC1jYQ==',
      skipTLSVerify: true,
    });
  });
});
