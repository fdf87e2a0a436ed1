import { describe, test, expect } from 'vitest';
import {
  ConflictError,
  DecodeError,
  NoMessagesFoundError,
  NotFoundError,
  StoreError,
  TransportError,
  ValidationError,
} from './errors';
import { toErrorResponse, toStandardResponse } from './response';

describe('toStandardResponse', () => {
  test('wraps data with a status and message', () => {
    expect(toStandardResponse(201, 'Broker created successfully.', { id: 1 })).toEqual({
      statusCode: 201,
      message: 'Broker created successfully.',
      data: { id: 1 },
    });
  });
});

describe('toErrorResponse', () => {
  test('every error kind has its own status', () => {
    const statuses = [
      new NotFoundError('broker', 3),
      new ConflictError('topic', 2),
      new ValidationError(['/port must be >= 1']),
      new NoMessagesFoundError('events'),
      new TransportError('127.0.0.1:9092', new Error('ECONNREFUSED')),
      new DecodeError('events', '4', new Error('bad')),
      new StoreError('list brokers', new Error('gone')),
    ].map(error => [error.code, toErrorResponse(error).statusCode]);

    expect(statuses).toEqual([
      ['not_found', 404],
      ['conflict', 409],
      ['validation', 422],
      ['no_messages', 404],
      ['transport', 502],
      ['decode', 502],
      ['store', 500],
    ]);
  });

  test('a conflict carries the existing id', () => {
    expect(toErrorResponse(new ConflictError('broker', 1))).toEqual({
      statusCode: 409,
      code: 'conflict',
      message: 'broker 1 already exists',
      existingId: 1,
    });
  });

  test('a validation error carries its issues', () => {
    expect(toErrorResponse(new ValidationError(['/name must NOT have fewer than 1 characters']))).toEqual({
      statusCode: 422,
      code: 'validation',
      message: 'Invalid input: /name must NOT have fewer than 1 characters',
      issues: ['/name must NOT have fewer than 1 characters'],
    });
  });

  test('NotFound and NoMessagesFound share a status but not a code', () => {
    const notFound = toErrorResponse(new NotFoundError('dataset_message', 5, 'Message configuration not found for dataset 5'));
    const empty = toErrorResponse(new NoMessagesFoundError('telemetry'));

    expect(notFound).toEqual({
      statusCode: 404,
      code: 'not_found',
      message: 'Message configuration not found for dataset 5',
    });
    expect(empty).toEqual({ statusCode: 404, code: 'no_messages', message: 'No messages in stream topic: telemetry' });
  });

  test('anything else is internal', () => {
    expect(toErrorResponse(new Error('boom'))).toEqual({ statusCode: 500, code: 'internal', message: 'boom' });
    expect(toErrorResponse('boom')).toEqual({ statusCode: 500, code: 'internal', message: 'boom' });
  });
});
