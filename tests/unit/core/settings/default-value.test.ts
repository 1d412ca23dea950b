/**
 * Tests for default value serialization.
 */
import { describe, it, expect } from 'vitest';
import { literalToken, serializeDefaultValue } from '../../../../src/core/settings/default-value.js';
import { createNode } from '../../../../src/core/tree/types.js';
import {
  booleanLiteral,
  classInstanceCreation,
  methodInvocation,
  numberLiteral,
  qualifiedName,
  simpleName,
  simpleType,
  stringLiteral,
} from '../../../helpers/java-trees.js';

describe('serializeDefaultValue', () => {
  it('emits numeric literals from their literal token', () => {
    expect(serializeDefaultValue(numberLiteral('5'))).toBe('5');
    expect(serializeDefaultValue(numberLiteral('0x1F'))).toBe('0x1F');
  });

  it('emits boolean literals from their boolean attribute', () => {
    expect(serializeDefaultValue(booleanLiteral(true))).toBe('true');
    expect(serializeDefaultValue(booleanLiteral(false))).toBe('false');
  });

  it('joins method invocation pieces with ->', () => {
    const call = methodInvocation('TimeValue', 'timeValueSeconds', [numberLiteral('30')]);
    expect(serializeDefaultValue(call)).toBe('TimeValue->timeValueSeconds->30');
  });

  it('uses the plain token for non-numeric invocation children', () => {
    const call = methodInvocation('Runtime', 'availableProcessors', [qualifiedName('A.B')]);
    // qualified names have no token of their own
    expect(serializeDefaultValue(call)).toBe('Runtime->availableProcessors->');
  });

  it('joins numeric and qualified-name construction arguments', () => {
    const creation = classInstanceCreation(simpleType('ByteSizeValue'), [
      numberLiteral('7'),
      qualifiedName('X.Y'),
    ]);
    expect(serializeDefaultValue(creation)).toBe('7->X.Y');
  });

  it('skips other construction children', () => {
    const creation = classInstanceCreation(simpleType('TimeValue'), [
      stringLiteral('ignored'),
      numberLiteral('1'),
      simpleName('unit'),
    ]);
    expect(serializeDefaultValue(creation)).toBe('1');
  });

  it('emits an empty string for a construction without usable children', () => {
    const creation = classInstanceCreation(simpleType('Object'), []);
    expect(serializeDefaultValue(creation)).toBe('');
  });

  it('falls back to the node token for other shapes', () => {
    expect(serializeDefaultValue(stringLiteral('info'))).toBe('info');
    expect(serializeDefaultValue(simpleName('DEFAULT_TIMEOUT'))).toBe('DEFAULT_TIMEOUT');
    expect(serializeDefaultValue(qualifiedName('Level.INFO'))).toBe('');
  });

  it('does not treat inherited object keys as rules', () => {
    expect(serializeDefaultValue(createNode('toString', { token: 't' }))).toBe('t');
  });
});

describe('literalToken', () => {
  it('prefers the token attribute', () => {
    expect(literalToken(createNode('NumberLiteral', { token: '9', attributes: { token: '10' } }))).toBe('10');
  });

  it('falls back to the node token', () => {
    expect(literalToken(createNode('NumberLiteral', { token: '9' }))).toBe('9');
  });
});
