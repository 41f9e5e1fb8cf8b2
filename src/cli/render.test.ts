import { describe, it, expect } from 'vitest';
import {
  createArgument,
  createCommand,
  createDocument,
  createInfo,
  createOption,
} from '../model/index.js';
import { renderCommandTree, renderDocument } from './render.js';

const MINIMAL = createDocument('0.1', createInfo('demo', '1.0'));

const NESTED = createDocument('0.1', createInfo('pkgtool', '2.3.0'), {
  options: [createOption('--verbose', { aliases: ['-v'] })],
  commands: [
    createCommand('install', {
      aliases: ['i', 'add'],
      description: 'Install a package',
      arguments: [createArgument('package')],
      options: [createOption('--source', { aliases: ['-s'] }), createOption('--mode')],
    }),
    createCommand('cache', {
      commands: [createCommand('clear', { hidden: true })],
    }),
  ],
});

describe('renderCommandTree', () => {
  it('should render only the header for an empty document', () => {
    expect(renderCommandTree(MINIMAL)).toBe('demo 1.0 (opencli 0.1)');
  });

  it('should indent nested members and mark hidden ones', () => {
    expect(renderCommandTree(NESTED)).toBe(
      [
        'pkgtool 2.3.0 (opencli 0.1)',
        '  --verbose, -v',
        '  install (i, add) - Install a package',
        '    <package>',
        '    --source, -s',
        '    --mode',
        '  cache',
        '    clear [hidden]',
      ].join('\n')
    );
  });

  it('should list arguments before options', () => {
    const doc = createDocument('0.1', createInfo('demo', '1.0'), {
      options: [createOption('--all')],
      arguments: [createArgument('path', { hidden: true })],
    });

    expect(renderCommandTree(doc).split('\n').slice(1)).toEqual(['  <path> [hidden]', '  --all']);
  });
});

describe('renderDocument', () => {
  it('should render indented JSON when pretty', () => {
    expect(renderDocument(MINIMAL, 'json', true)).toBe(
      '{\n  "opencli": "0.1",\n  "info": {\n    "title": "demo",\n    "version": "1.0"\n  }\n}'
    );
  });

  it('should render compact JSON when not pretty', () => {
    expect(renderDocument(MINIMAL, 'json', false)).toBe(
      '{"opencli":"0.1","info":{"title":"demo","version":"1.0"}}'
    );
  });

  it('should render YAML without a trailing newline', () => {
    expect(renderDocument(MINIMAL, 'yaml', true)).toBe(
      "opencli: '0.1'\ninfo:\n  title: demo\n  version: '1.0'"
    );
  });

  it('should render the command tree', () => {
    expect(renderDocument(NESTED, 'tree', false)).toBe(renderCommandTree(NESTED));
  });
});
