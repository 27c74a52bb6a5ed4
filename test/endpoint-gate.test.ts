import { describe, it, expect } from 'vitest';
import { isSupportedEndpoint } from '../src/endpoint-gate';
import { makeEndpoint } from './helpers';

describe('isSupportedEndpoint', (): void => {
  it('supports unix socket endpoints of any type', (): void => {
    expect(isSupportedEndpoint(makeEndpoint({ url: 'unix:///var/run/docker.sock' }))).toEqual({
      supported: true,
    });
    expect(
      isSupportedEndpoint(makeEndpoint({ url: 'unix:///var/run/docker.sock', type: 'agent-docker' })),
    ).toEqual({ supported: true });
  });

  it('supports named pipe endpoints', (): void => {
    expect(isSupportedEndpoint(makeEndpoint({ url: 'npipe:////./pipe/docker_engine' }))).toEqual({
      supported: true,
    });
  });

  it('supports the local Kubernetes environment over any URL', (): void => {
    const endpoint = makeEndpoint({ url: 'https://kubernetes.default.svc', type: 'kubernetes-local' });

    expect(isSupportedEndpoint(endpoint)).toEqual({ supported: true });
  });

  it('rejects tcp endpoints with a reason', (): void => {
    const endpoint = makeEndpoint({ id: 7, url: 'tcp://10.0.0.5:2375', type: 'docker' });

    expect(isSupportedEndpoint(endpoint)).toEqual({
      supported: false,
      reason: 'Endpoint 7 (docker) is not managed through a local socket',
    });
  });

  it('rejects remote Kubernetes agents', (): void => {
    const endpoint = makeEndpoint({ url: 'tcp://10.0.0.9:9001', type: 'agent-kubernetes' });

    expect(isSupportedEndpoint(endpoint).supported).toBe(false);
  });

  it('matches the scheme only at the start of the URL', (): void => {
    const endpoint = makeEndpoint({ url: 'tcp://proxy/unix://docker.sock' });

    expect(isSupportedEndpoint(endpoint).supported).toBe(false);
  });
});
