import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ValidationError } from './errors';
import {
  OFFSET_POLICIES,
  type BrokerInput,
  type BrokerPatch,
  type DatasetMessageInput,
  type OffsetPolicy,
  type TopicInput,
  type TopicPatch,
} from './model';

const ajv = new Ajv();
addFormats(ajv, ['ipv4', 'ipv6']);

const nameSchema = { type: 'string', minLength: 1 } as const;
const addressSchema = {
  type: 'string',
  anyOf: [
    { type: 'string', format: 'ipv4' },
    { type: 'string', format: 'ipv6' },
  ],
} as const;
const portSchema = { type: 'integer', minimum: 1, maximum: 65535 } as const;
const idSchema = { type: 'integer', minimum: 1 } as const;

const brokerInput = ajv.compile<BrokerInput>({
  type: 'object',
  properties: { name: nameSchema, address: addressSchema, port: portSchema },
  required: ['name', 'address', 'port'],
  additionalProperties: false,
});

const brokerPatch = ajv.compile<BrokerPatch>({
  type: 'object',
  properties: { name: nameSchema, address: addressSchema, port: portSchema },
  additionalProperties: false,
});

const topicInput = ajv.compile<TopicInput>({
  type: 'object',
  properties: { name: nameSchema, schema: { type: 'object' } },
  required: ['name', 'schema'],
  additionalProperties: false,
});

const topicPatch = ajv.compile<TopicPatch>({
  type: 'object',
  properties: { name: nameSchema, schema: { type: 'object' } },
  additionalProperties: false,
});

const datasetMessageInput = ajv.compile<DatasetMessageInput>({
  type: 'object',
  properties: {
    name: nameSchema,
    description: { type: 'string' },
    datasetType: { type: 'integer', enum: [0, 1, 2] },
    brokerId: idSchema,
    topicId: idSchema,
  },
  required: ['name', 'datasetType', 'brokerId', 'topicId'],
  additionalProperties: false,
});

export interface StreamWindowOptions {
  /** Maximum records to return. Defaults to the reader's default. */
  readonly maxRecords?: number;
  readonly offsetPolicy: OffsetPolicy;
}

const streamWindowOptions = ajv.compile<StreamWindowOptions>({
  type: 'object',
  properties: {
    maxRecords: idSchema,
    offsetPolicy: { type: 'string', enum: [...OFFSET_POLICIES] },
  },
  required: ['offsetPolicy'],
  additionalProperties: false,
});

/**
 * Format Ajv errors as "<path> <message>" lines.
 */
export function formatErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['input is invalid'];
  }
  return errors.map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

function check<T>(validate: ValidateFunction<T>, input: unknown): T {
  if (validate(input)) {
    return input;
  }
  throw new ValidationError(formatErrors(validate.errors));
}

export const validate = {
  brokerInput: (input: unknown): BrokerInput => check(brokerInput, input),
  brokerPatch: (input: unknown): BrokerPatch => check(brokerPatch, input),
  topicInput: (input: unknown): TopicInput => check(topicInput, input),
  topicPatch: (input: unknown): TopicPatch => check(topicPatch, input),
  datasetMessageInput: (input: unknown): DatasetMessageInput => check(datasetMessageInput, input),
  streamWindowOptions: (input: unknown): StreamWindowOptions => check(streamWindowOptions, input),
  id: (resource: string, id: unknown): number => {
    if (typeof id === 'number' && Number.isInteger(id) && id > 0) {
      return id;
    }
    throw new ValidationError([`${resource} id must be a positive integer`]);
  },
};
