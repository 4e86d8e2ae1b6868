import {
  ExecutionContext,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ConfigService } from '../../config/config.service';
import { SharedSecretGuard } from './shared-secret.guard';

function contextWith(headers: Record<string, string | string[]>): ExecutionContext {
  return new ExecutionContextHost([{ headers }, {}]);
}

describe('SharedSecretGuard', () => {
  const guard = new SharedSecretGuard(new ConfigService({ API_KEY: 'test-secret' }));

  it('admits the configured secret', () => {
    expect(guard.canActivate(contextWith({ 'x-api-key': 'test-secret' }))).toBe(true);
  });

  it('rejects a missing header with 401', () => {
    expect(() => guard.canActivate(contextWith({}))).toThrow(UnauthorizedException);
  });

  it('rejects an empty header with 401', () => {
    expect(() => guard.canActivate(contextWith({ 'x-api-key': '' }))).toThrow(
      UnauthorizedException,
    );
  });

  it('rejects a wrong secret with 403', () => {
    expect(() => guard.canActivate(contextWith({ 'x-api-key': 'test-secret-2' }))).toThrow(
      ForbiddenException,
    );
  });

  it('refuses to start without a configured secret', () => {
    expect(() => new SharedSecretGuard(new ConfigService({}))).toThrow(
      'Missing required environment variables: API_KEY',
    );
  });
});
