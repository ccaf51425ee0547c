import { SchemaObject } from 'ajv';

const priorityLabels = ['critical', 'high', 'medium', 'low'];

export const datasetSchema: SchemaObject = {
  type: 'object',
  required: ['agents', 'tickets'],
  properties: {
    agents: {
      type: 'array',
      items: {
        type: 'object',
        required: ['agent_id', 'name', 'skills', 'current_load', 'availability_status', 'experience_level'],
        properties: {
          agent_id: { type: 'string', minLength: 1 },
          name: { type: 'string' },
          skills: {
            type: 'object',
            additionalProperties: { type: 'number', minimum: 0, maximum: 10 },
          },
          current_load: { type: 'integer', minimum: 0 },
          availability_status: { type: 'string' },
          experience_level: { type: 'number', minimum: 0 },
        },
      },
    },
    tickets: {
      type: 'array',
      items: {
        type: 'object',
        required: ['ticket_id', 'title', 'description'],
        properties: {
          ticket_id: { type: 'string', minLength: 1 },
          title: { type: 'string' },
          description: { type: 'string' },
          creation_timestamp: { type: 'number' },
          priority: {
            oneOf: [
              { type: 'number', minimum: 1, maximum: 10 },
              { type: 'string', enum: priorityLabels },
            ],
          },
        },
      },
    },
  },
};
