import * as yaml from 'js-yaml';
import { describe, expect, it } from 'vitest';
import {
  createArgument,
  createCommand,
  createDocument,
  createExitCode,
  createInfo,
  createMetadata,
  createOption,
  decodeDocument,
  encodeDocument,
  toJson,
  toYaml,
} from './index.js';

const MINIMAL = createDocument('0.1', createInfo('demo', '1.0'));

describe('encodeDocument', () => {
  it('should omit empty sequences and absent optionals', () => {
    expect(encodeDocument(MINIMAL)).toEqual({
      opencli: '0.1',
      info: { title: 'demo', version: '1.0' },
    });
  });

  it('should keep false booleans and empty strings', () => {
    const doc = createDocument('0.1', createInfo('demo', '1.0', { summary: '' }), {
      interactive: false,
      conventions: { groupOptions: false },
    });

    expect(encodeDocument(doc)).toEqual({
      opencli: '0.1',
      info: { title: 'demo', summary: '', version: '1.0' },
      conventions: { groupOptions: false },
      interactive: false,
    });
  });

  it('should write root fields in model order', () => {
    const doc = createDocument('0.1', createInfo('demo', '1.0'), {
      interactive: true,
      metadata: [createMetadata('m')],
      examples: ['demo run'],
      exitCodes: [createExitCode(0)],
      commands: [createCommand('run')],
      options: [createOption('--verbose')],
      arguments: [createArgument('target')],
      conventions: {},
    });

    expect(Object.keys(encodeDocument(doc))).toEqual([
      'opencli',
      'info',
      'conventions',
      'arguments',
      'options',
      'commands',
      'exitCodes',
      'examples',
      'interactive',
      'metadata',
    ]);
  });

  it('should write info fields with version last', () => {
    const info = createInfo('demo', '1.0', {
      license: { identifier: 'MIT' },
      contact: { email: 'team@example.com' },
      description: 'Long',
      summary: 'Short',
    });

    expect(Object.keys(encodeDocument(createDocument('0.1', info)).info ?? {})).toEqual([
      'title',
      'summary',
      'description',
      'contact',
      'license',
      'version',
    ]);
  });

  it('should encode nested commands, options and arguments', () => {
    const doc = createDocument('0.1', createInfo('demo', '1.0'), {
      commands: [
        createCommand('install', {
          aliases: ['i'],
          hidden: false,
          options: [
            createOption('--source', {
              arguments: [createArgument('url', { required: true, arity: { minimum: 1 } })],
            }),
          ],
          exitCodes: [createExitCode(3, 'Not found')],
          metadata: [createMetadata('tags', ['a', 1, null])],
        }),
      ],
    });

    expect(encodeDocument(doc)).toEqual({
      opencli: '0.1',
      info: { title: 'demo', version: '1.0' },
      commands: [
        {
          name: 'install',
          aliases: ['i'],
          options: [
            {
              name: '--source',
              arguments: [{ name: 'url', required: true, arity: { minimum: 1 } }],
            },
          ],
          exitCodes: [{ code: 3, description: 'Not found' }],
          hidden: false,
          metadata: [{ name: 'tags', value: ['a', 1, null] }],
        },
      ],
    });
  });
});

describe('toJson', () => {
  it('should indent with two spaces by default', () => {
    expect(toJson(MINIMAL)).toBe(
      [
        '{',
        '  "opencli": "0.1",',
        '  "info": {',
        '    "title": "demo",',
        '    "version": "1.0"',
        '  }',
        '}',
      ].join('\n')
    );
  });

  it('should write a single line when pretty is false', () => {
    expect(toJson(MINIMAL, { pretty: false })).toBe(
      '{"opencli":"0.1","info":{"title":"demo","version":"1.0"}}'
    );
  });

  it('should produce text that decodes to an equal document', () => {
    const doc = createDocument('0.1', createInfo('demo', '1.0'), {
      examples: ['demo --help'],
      metadata: [createMetadata('nested', { list: [true, 2.5] })],
    });
    expect(decodeDocument(JSON.parse(toJson(doc)))).toEqual(doc);
  });
});

describe('toYaml', () => {
  it('should quote version strings that look like numbers', () => {
    expect(toYaml(MINIMAL)).toBe(
      ["opencli: '0.1'", 'info:', '  title: demo', "  version: '1.0'", ''].join('\n')
    );
  });

  it('should produce YAML that loads back to the encoded object', () => {
    const doc = createDocument('0.1', createInfo('demo', '1.0'), {
      commands: [createCommand('run', { description: 'Run: now', examples: ['demo run -x'] })],
    });

    expect(yaml.load(toYaml(doc), { schema: yaml.CORE_SCHEMA })).toEqual(encodeDocument(doc));
  });
});
