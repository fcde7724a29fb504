import { describe, it, expect } from 'vitest';

import {
  AbortedError,
  BranchResolutionError,
  DirectoryUnavailableError,
  FallbackNotFoundError,
  FallbackProductionRefusedError,
  InteractiveCancelledError,
  NoInteractiveCandidatesError,
  ProductionRefusedError,
  ResolutionErrorKind,
  UnresolvedError,
  isBranchResolutionError,
} from '../src/errors.js';

describe('resolution errors', () => {
  it('should carry a distinct kind and a next step for every failure', () => {
    const errors: BranchResolutionError[] = [
      new DirectoryUnavailableError('x', 'exit 1'),
      new ProductionRefusedError('x'),
      new FallbackNotFoundError('x'),
      new FallbackProductionRefusedError('x'),
      new NoInteractiveCandidatesError('x'),
      new InteractiveCancelledError('x'),
      new UnresolvedError('x'),
      new AbortedError('x'),
    ];

    expect(new Set(errors.map(e => e.kind)).size).toBe(Object.keys(ResolutionErrorKind).length);
    for (const error of errors) {
      expect(error.target).toBe('x');
      expect(error.nextStep.length).toBeGreaterThan(0);
      expect(error.message).toContain("'x'");
      expect(isBranchResolutionError(error)).toBe(true);
    }
  });

  it('should use the class name as the error name', () => {
    expect(new FallbackNotFoundError('develop').name).toBe('FallbackNotFoundError');
  });

  it('should allow a custom next step for directory failures', () => {
    const error = new DirectoryUnavailableError('x', 'branching is not enabled', {
      nextStep: 'Enable branching in the dashboard',
    });

    expect(error.message).toBe("branch directory unavailable while resolving 'x': branching is not enabled");
    expect(error.nextStep).toBe('Enable branching in the dashboard');
  });

  it('should not treat plain errors as resolution errors', () => {
    expect(isBranchResolutionError(new Error('boom'))).toBe(false);
  });
});
