import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import { buildDesiredInput, createProgram, runApply, runPlan } from '../cli.js';
import type { CliDependencies, CommandOptions } from '../cli.js';
import { PipelineApiError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import { InMemoryPipelineClient, makeRecord } from './fixtures/in-memory-pipeline-client.js';

interface FakeDependencies extends CliDependencies {
  createClient: Mock<CliDependencies['createClient']>;
}

function fakeDeps(client: InMemoryPipelineClient): FakeDependencies {
  return {
    createClient: vi.fn<CliDependencies['createClient']>(async () => client),
    createLogger: () => createSilentLogger(),
  };
}

const prodOptions: CommandOptions = {
  name: 'prod',
  inputBucket: 'in',
  outputBucket: 'out',
  role: 'arn:role',
  notification: ['Completed=arn:1', 'warning=arn:1', 'ERROR=arn:1'],
  region: 'us-west-2',
};

describe('CLI', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env['AWS_REGION'];
    delete process.env['AWS_DEFAULT_REGION'];
    delete process.env['TRANSCODER_ENDPOINT'];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('runApply', () => {
    it('creates the pipeline, then reports no change on a second run', async () => {
      const client = new InMemoryPipelineClient();
      const deps = fakeDeps(client);

      const first = await runApply(prodOptions, deps);
      const second = await runApply(prodOptions, deps);

      expect(first).toEqual({
        success: true,
        output: '{"changed":true,"name":"prod","id":"pipeline-1"}',
        exitCode: 0,
      });
      expect(second.output).toBe('{"changed":false,"name":"prod","id":"pipeline-1"}');
      expect(client.calls[1]).toEqual({
        operation: 'create',
        input: {
          name: 'prod',
          inputBucket: 'in',
          outputBucket: 'out',
          role: 'arn:role',
          notifications: { Progressing: '', Completed: 'arn:1', Warning: 'arn:1', Error: 'arn:1' },
        },
      });
    });

    it('reports an absent pipeline without an id', async () => {
      const client = new InMemoryPipelineClient();

      const result = await runApply({ name: 'prod', state: 'absent', region: 'us-west-2' }, fakeDeps(client));

      expect(result.output).toBe('{"changed":false,"name":"prod"}');
      expect(client.operations()).toEqual(['list']);
    });

    it('deletes an existing pipeline', async () => {
      const client = new InMemoryPipelineClient([makeRecord()]);

      const result = await runApply({ name: 'prod', state: 'absent', region: 'us-west-2' }, fakeDeps(client));

      expect(result.output).toBe('{"changed":true,"name":"prod","id":"existing-1"}');
      expect(client.calls).toEqual([{ operation: 'list' }, { operation: 'delete', id: 'existing-1' }]);
    });

    it('renders remote failures with the message unchanged and exit code 1', async () => {
      const client = new InMemoryPipelineClient();
      client.failWith('create', new PipelineApiError('create', 'Role is invalid', { code: 'ValidationException' }));

      const result = await runApply(prodOptions, fakeDeps(client));

      expect(result).toEqual({
        success: false,
        output: '{"failed":true,"msg":"Role is invalid"}',
        exitCode: 1,
      });
    });

    it('fails before any remote call without a region', async () => {
      const deps = fakeDeps(new InMemoryPipelineClient());

      const result = await runApply({ ...prodOptions, region: undefined }, deps);

      expect(result.output).toBe(
        '{"failed":true,"msg":"region must be specified (use --region, AWS_REGION or AWS_DEFAULT_REGION)"}',
      );
      expect(result.exitCode).toBe(1);
      expect(deps.createClient).not.toHaveBeenCalled();
    });

    it('reads the region from AWS_REGION', async () => {
      process.env['AWS_REGION'] = 'eu-west-1';
      const deps = fakeDeps(new InMemoryPipelineClient());

      const result = await runApply({ name: 'prod', state: 'absent' }, deps);

      expect(result.success).toBe(true);
      expect(deps.createClient).toHaveBeenCalledWith(
        expect.objectContaining({ region: 'eu-west-1' }),
        expect.anything(),
      );
    });

    it('lists every missing field of an invalid desired state', async () => {
      const deps = fakeDeps(new InMemoryPipelineClient());

      const result = await runApply({ name: 'prod', region: 'us-west-2' }, deps);

      expect(JSON.parse(result.output)).toEqual({
        failed: true,
        msg:
          'Invalid desired state:\n' +
          "  input-bucket: Required field 'input-bucket' is missing\n" +
          "  output-bucket: Required field 'output-bucket' is missing\n" +
          "  role: Required field 'role' is missing",
      });
      expect(deps.createClient).not.toHaveBeenCalled();
    });

    it('renders text output', async () => {
      const result = await runApply(
        { name: 'prod', state: 'absent', region: 'us-west-2', output: 'text' },
        fakeDeps(new InMemoryPipelineClient()),
      );

      expect(stripVTControlCharacters(result.output)).toBe('ok: pipeline "prod" is absent');
    });
  });

  describe('runPlan', () => {
    it('reports the update and its differing fields without changing anything', async () => {
      const client = new InMemoryPipelineClient([makeRecord()]);

      const result = await runPlan({ ...prodOptions, role: 'arn:new-role' }, fakeDeps(client));

      expect(result.output).toBe('{"action":"update","name":"prod","id":"existing-1","differingFields":["role"]}');
      expect(client.operations()).toEqual(['list']);
    });
  });

  describe('buildDesiredInput', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-cli-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('lets flags override the file', () => {
      const file = path.join(tmpDir, 'pipeline.yaml');
      fs.writeFileSync(
        file,
        [
          'name: prod',
          'inputBucket: in',
          'output-bucket: out',
          'role: arn:role',
          'notifications:',
          '  Completed: arn:file',
          '  Error: arn:file',
        ].join('\n'),
      );

      const input = buildDesiredInput({
        file,
        inputBucket: 'in-flag',
        role: 'arn:flag-role',
        notification: ['completed=arn:flag'],
      });

      expect(input).toEqual({
        success: true,
        raw: {
          name: 'prod',
          'input-bucket': 'in-flag',
          'output-bucket': 'out',
          role: 'arn:flag-role',
          notifications: { Error: 'arn:file', completed: 'arn:flag' },
        },
      });
    });

    it('rejects a notification flag without "="', () => {
      expect(buildDesiredInput({ notification: ['Completed'] })).toEqual({
        success: false,
        errors: [{ field: 'notification', message: 'Expected event=topic, got "Completed"' }],
      });
    });

    it('reports an unreadable file', () => {
      const input = buildDesiredInput({ file: path.join(tmpDir, 'missing.yaml') });

      expect(input.success).toBe(false);
    });
  });

  describe('createProgram', () => {
    afterEach(() => {
      process.exitCode = undefined;
    });

    it('registers apply and plan', () => {
      const program = createProgram(fakeDeps(new InMemoryPipelineClient()), () => undefined);

      expect(program.commands.map((c) => c.name())).toEqual(['apply', 'plan']);
    });

    it('writes the apply result for parsed flags', async () => {
      const lines: string[] = [];
      const program = createProgram(fakeDeps(new InMemoryPipelineClient()), (line) => lines.push(line));

      await program.parseAsync([
        'node',
        'pipeline-reconciler',
        'apply',
        '--name',
        'prod',
        '--state',
        'absent',
        '--region',
        'us-west-2',
      ]);

      expect(lines).toEqual(['{"changed":false,"name":"prod"}']);
      expect(process.exitCode).toBe(0);
    });
  });
});
