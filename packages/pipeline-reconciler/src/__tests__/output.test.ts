import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import { formatFailure, formatPlan, formatResult } from '../output.js';
import { PipelineApiError } from '../errors.js';
import { makeRecord } from './fixtures/in-memory-pipeline-client.js';

describe('formatResult', () => {
  it('renders changed, name and id as JSON', () => {
    const output = formatResult({ changed: true, action: 'create', name: 'prod', id: 'pipeline-1' }, 'json');

    expect(output).toBe('{"changed":true,"name":"prod","id":"pipeline-1"}');
  });

  it('leaves the id out when nothing exists', () => {
    const output = formatResult({ changed: false, action: 'none', name: 'prod' }, 'json');

    expect(output).toBe('{"changed":false,"name":"prod"}');
  });

  it('renders text lines', () => {
    const text = (result: Parameters<typeof formatResult>[0]) =>
      stripVTControlCharacters(formatResult(result, 'text'));

    expect(text({ changed: true, action: 'update', name: 'prod', id: 'p-1' })).toBe(
      'changed: updated pipeline "prod" (p-1)',
    );
    expect(text({ changed: false, action: 'none', name: 'prod', id: 'p-1' })).toBe(
      'ok: pipeline "prod" (p-1) is up to date',
    );
    expect(text({ changed: false, action: 'none', name: 'prod' })).toBe('ok: pipeline "prod" is absent');
  });
});

describe('formatPlan', () => {
  it('renders the plan as JSON', () => {
    const output = formatPlan(
      { action: 'update', name: 'prod', existing: makeRecord({ id: 'p-1' }), differingFields: ['role'] },
      'json',
    );

    expect(output).toBe('{"action":"update","name":"prod","id":"p-1","differingFields":["role"]}');
  });

  it('renders an update plan as text with the differing fields', () => {
    const output = formatPlan(
      {
        action: 'update',
        name: 'prod',
        existing: makeRecord({ id: 'p-1' }),
        differingFields: ['role', 'notifications'],
      },
      'text',
    );

    expect(stripVTControlCharacters(output)).toBe('update: pipeline "prod" (p-1) (role, notifications)');
  });

  it('renders a create plan as text', () => {
    const output = formatPlan({ action: 'create', name: 'prod', differingFields: [] }, 'text');

    expect(stripVTControlCharacters(output)).toBe('create: pipeline "prod"');
  });
});

describe('formatFailure', () => {
  it('renders the message verbatim as JSON', () => {
    const error = new PipelineApiError('create', 'Role "arn:role" is invalid', { code: 'ValidationException' });

    expect(formatFailure(error, 'json')).toBe('{"failed":true,"msg":"Role \\"arn:role\\" is invalid"}');
  });

  it('renders text with an error prefix', () => {
    expect(stripVTControlCharacters(formatFailure(new Error('boom'), 'text'))).toBe('error: boom');
  });
});
