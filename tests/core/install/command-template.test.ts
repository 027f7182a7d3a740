import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  findUnresolvedPlaceholders,
  renderTemplate,
  renderValue
} from '../../../src/core/install/command-template.js';
import { TemplateError } from '../../../src/utils/errors.js';

describe('renderTemplate', () => {
  it('substitutes every token independently', () => {
    assert.deepEqual(
      renderTemplate(['msiexec', '/i', '{download_path}', '/qn'], { download_path: 'C:\\tmp\\tool.msi' }),
      ['msiexec', '/i', 'C:\\tmp\\tool.msi', '/qn']
    );
  });

  it('replaces placeholders embedded in a token', () => {
    assert.deepEqual(
      renderTemplate(['--prefix={install_dir}/bin', '{install_dir}:{product_id}'], {
        install_dir: '/opt/tool',
        product_id: 'tool-x64'
      }),
      ['--prefix=/opt/tool/bin', '/opt/tool:tool-x64']
    );
  });

  it('does not expand placeholders inside substituted values', () => {
    assert.deepEqual(renderTemplate(['{install_dir}'], { install_dir: '{product_id}' }), ['{product_id}']);
  });

  it('fails on a placeholder without a value', () => {
    assert.throws(
      () => renderTemplate(['run', '{download_path}'], {}),
      (error: unknown) =>
        error instanceof TemplateError &&
        error.message === 'Unresolved placeholder {download_path} in command: run {download_path}'
    );
  });

  it('fails on an unknown placeholder even when all known ones are supplied', () => {
    assert.throws(
      () => renderTemplate(['{version}'], { download_path: 'a', install_dir: 'b', product_id: 'c' }),
      TemplateError
    );
  });
});

describe('findUnresolvedPlaceholders', () => {
  it('lists each missing key once, in order of appearance', () => {
    assert.deepEqual(findUnresolvedPlaceholders(['{b}', '{install_dir}', '{a}', '{b}'], { install_dir: '/x' }), [
      'b',
      'a'
    ]);
  });
});

describe('renderValue', () => {
  it('renders a single string', () => {
    assert.equal(renderValue('{install_dir}/bin', { install_dir: '/opt/tool' }), '/opt/tool/bin');
  });
});
