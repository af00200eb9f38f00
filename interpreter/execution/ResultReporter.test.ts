import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ResultReporter } from './ResultReporter';
import { ValueFormatter } from './ValueFormatter';
import { SessionContext } from '@interpreter/env/SessionContext';
import { VariableEnvironment } from '@interpreter/env/VariableEnvironment';
import { SessionReflection } from '@services/reflection/SessionReflection';
import { TypeResolver } from '@interpreter/types/TypeResolver';
import { TypeNamer } from '@interpreter/types/TypeNamer';
import { ExecutionError } from '@core/errors';
import type { LoadableUnit } from '@core/types/compiler';

const unit = (name: string, code: string, persisted = false): LoadableUnit => ({
  name,
  source: '',
  code,
  persisted
});

describe('ResultReporter', () => {
  let context: SessionContext;
  let env: VariableEnvironment;
  let output: string;
  let dumping: boolean;
  let reporter: ResultReporter;

  beforeEach(() => {
    output = '';
    dumping = true;
    env = new VariableEnvironment();
    context = new SessionContext(text => {
      output += text;
    });
    context.bind('V', env.asSlots());
    const reflection = new SessionReflection(context);
    const resolver = new TypeResolver(reflection);
    const formatter = new ValueFormatter(new TypeNamer(resolver, reflection.isCastable), {
      getLineWidth: () => 80,
      getMaxLineCount: () => 20
    });
    reporter = new ResultReporter(context, env, formatter, {
      dumping: () => dumping,
      write: text => {
        output += text;
      }
    });
  });

  afterEach(() => {
    context.cleanup();
  });

  it('should run a fragment and display its result', () => {
    reporter.runFragment(unit('fragment1', '(function () { V["_"] = 2 + 2; });'), true);

    expect(env.get('_')).toBe(4);
    expect(output).toBe('(number) 4\n');
  });

  it('should display nothing for statements', () => {
    reporter.runFragment(unit('fragment1', '(function () { V["x"] = 5; });'), false);

    expect(env.get('x')).toBe(5);
    expect(output).toBe('');
  });

  it('should display nothing while dumping is off', () => {
    dumping = false;
    reporter.runFragment(unit('fragment1', '(function () { V["_"] = 1; });'), true);

    expect(env.get('_')).toBe(1);
    expect(output).toBe('');
  });

  it('should label values created inside the context by their own realm type', () => {
    reporter.runFragment(unit('fragment1', '(function () { V["_"] = new Set([1]); });'), true);
    expect(output).toBe('(Set<any>)\n{1}\n');
  });

  it('should wrap anything thrown', () => {
    const run = () => reporter.runFragment(unit('fragment1', '(function () { null.x; });'), false);

    expect(run).toThrow(ExecutionError);
    expect(run).toThrow(/^TypeError was thrown: Cannot read properties of null/);
  });

  it('should keep partial effects of a fragment that throws', () => {
    const code = '(function () { V["a"] = 1; throw new RangeError("too far"); });';

    expect(() => reporter.runFragment(unit('fragment1', code), false)).toThrow('RangeError was thrown: too far');
    expect(env.get('a')).toBe(1);
  });

  it('should instantiate a persisted unit under its class name', () => {
    const ctor = reporter.instantiateUnit(
      unit('Unit1', 'class Unit1 { _f() { return 3; } }', true),
      'Unit1'
    );

    expect(typeof ctor).toBe('function');
    expect(context.evaluate('V["Unit1"]._f()')).toBe(3);
  });
});
