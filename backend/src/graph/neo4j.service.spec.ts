import { HttpStatus } from '@nestjs/common';
import neo4j from 'neo4j-driver';
import { newError } from 'neo4j-driver-core';
import { ConfigService } from '../config/config.service';
import { UpstreamUnavailableException } from '../common/errors';
import { Neo4jService, translateError } from './neo4j.service';

describe('translateError', () => {
  it('maps an unreachable store to 503', () => {
    const translated = translateError(
      newError('connection refused', neo4j.error.SERVICE_UNAVAILABLE),
    );

    expect(translated).toBeInstanceOf(UpstreamUnavailableException);
    expect(translated).toMatchObject({ message: 'Graph store unavailable' });
    expect(
      translated instanceof UpstreamUnavailableException && translated.getStatus(),
    ).toBe(HttpStatus.SERVICE_UNAVAILABLE);
  });

  it('maps a transaction timeout to 504', () => {
    const translated = translateError(
      newError(
        'timed out',
        'Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration',
      ),
    );

    expect(
      translated instanceof UpstreamUnavailableException && translated.getStatus(),
    ).toBe(HttpStatus.GATEWAY_TIMEOUT);
  });

  it('passes other errors through', () => {
    const syntax = newError('bad query', 'Neo.ClientError.Statement.SyntaxError');
    const plain = new Error('boom');

    expect(translateError(syntax)).toBe(syntax);
    expect(translateError(plain)).toBe(plain);
  });
});

describe('Neo4jService', () => {
  it('refuses queries before it has connected', async () => {
    const service = new Neo4jService(new ConfigService({}));

    await expect(service.read('RETURN 1')).rejects.toThrow('Graph store is not connected');
  });

  it('surfaces transaction failures without driver-side retries', async () => {
    const driver = jest.spyOn(neo4j, 'driver').mockImplementation(() => {
      throw new Error('driver construction stopped');
    });
    const service = new Neo4jService(
      new ConfigService({
        NEO4J_URI: 'bolt://127.0.0.1:7687',
        NEO4J_PASSWORD: 'test-password',
      }),
    );

    await expect(service.onModuleInit()).rejects.toThrow('driver construction stopped');
    expect(driver).toHaveBeenCalledTimes(1);
    expect(driver.mock.calls[0]?.[2]).toMatchObject({
      maxTransactionRetryTime: 0,
      disableLosslessIntegers: true,
    });

    driver.mockRestore();
  });

  it('fails startup when connection settings are missing', async () => {
    const service = new Neo4jService(new ConfigService({}));

    await expect(service.onModuleInit()).rejects.toThrow(
      'Missing required environment variables: NEO4J_URI, NEO4J_PASSWORD/NEO4J_PASS',
    );
  });
});
