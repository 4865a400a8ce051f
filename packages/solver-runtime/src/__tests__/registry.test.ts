import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CapabilityError, ProtocolError } from '@bbo-plugin/contracts';
import { FakeSolverFactory } from '@bbo-plugin/testing';
import { SolverRegistry } from '../registry.js';

describe('SolverRegistry', () => {
  let factory: FakeSolverFactory;
  let registry: SolverRegistry;

  beforeEach(() => {
    factory = new FakeSolverFactory();
    registry = new SolverRegistry(factory);
  });

  describe('create', () => {
    it('should build through the factory and store the solver', async () => {
      const spy = vi.spyOn(factory, 'createSolver');

      const solver = await registry.create(1n, 42n, { name: 'p' });

      expect(spy).toHaveBeenCalledWith(42n, { name: 'p' });
      expect(registry.get(1n)).toBe(solver);
      expect(registry.size).toBe(1);
    });

    it('should replace an existing entry', async () => {
      const first = await registry.create(1n, 1n, {});
      const second = await registry.create(1n, 2n, {});

      expect(second).not.toBe(first);
      expect(registry.get(1n)).toBe(second);
      expect(registry.size).toBe(1);
    });

    it('should store nothing when the factory fails', async () => {
      const failing = new SolverRegistry(new FakeSolverFactory({ createError: new Error('bad problem') }));

      await expect(failing.create(3n, 0n, {})).rejects.toBeInstanceOf(CapabilityError);
      expect(failing.has(3n)).toBe(false);
    });

    it('should key solvers by ids beyond 2^53', async () => {
      const solver = await registry.create(18446744073709551615n, 1n, {});

      expect(registry.get(18446744073709551615n)).toBe(solver);
      expect(registry.has(18446744073709551614n)).toBe(false);
    });
  });

  describe('drop', () => {
    it('should remove an entry', async () => {
      await registry.create(1n, 1n, {});

      expect(registry.drop(1n)).toBe(true);
      expect(registry.get(1n)).toBeUndefined();
    });

    it('should ignore unknown ids', () => {
      expect(registry.drop(99n)).toBe(false);
      expect(registry.size).toBe(0);
    });
  });

  describe('require', () => {
    it('should return a live solver', async () => {
      const solver = await registry.create(2n, 1n, {});

      expect(registry.require(2n)).toBe(solver);
    });

    it('should throw UNKNOWN_SOLVER on a miss', async () => {
      await registry.create(2n, 1n, {});

      expect(() => registry.require(5n)).toThrow(ProtocolError);
      expect(() => registry.require(5n)).toThrow('Unknown solver: 5');
    });
  });

  it('should list ids in insertion order', async () => {
    await registry.create(3n, 1n, {});
    await registry.create(1n, 1n, {});

    expect(registry.ids()).toEqual([3n, 1n]);
  });
});
