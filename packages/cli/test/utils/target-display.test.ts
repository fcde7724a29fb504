import { Environment, type BranchTarget } from '@branchgate/core';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { displayTarget, targetToRecord } from '../../src/utils/target-display.js';

const target: BranchTarget = {
  gitBranch: 'feature/login',
  remoteBranch: {
    name: 'develop',
    gitBranchName: 'develop',
    projectRef: 'devref',
    isDefault: false,
    isPersistent: true,
    status: 'ACTIVE_HEALTHY',
  },
  environment: Environment.Development,
  projectRef: 'devref',
  apiUrl: 'https://devref.supabase.co',
  isOverride: true,
  overrideFrom: 'feature/login',
  isFallback: false,
  resolvedVia: 'exact',
};

describe('target-display', () => {
  describe('targetToRecord', () => {
    it('should produce a snake_case record without absent region', () => {
      expect(targetToRecord(target, false)).toEqual({
        git_branch: 'feature/login',
        environment: 'Development',
        remote_branch: 'develop',
        remote_git_branch: 'develop',
        project_ref: 'devref',
        api_url: 'https://devref.supabase.co',
        status: 'ACTIVE_HEALTHY',
        protected: false,
        is_override: true,
        override_from: 'feature/login',
        is_fallback: false,
        resolved_via: 'exact',
      });
    });

    it('should include the region when known', () => {
      expect(targetToRecord({ ...target, region: 'us-east-1' }, false)).toMatchObject({ region: 'us-east-1' });
    });
  });

  describe('displayTarget', () => {
    let lines: string[];

    beforeEach(() => {
      lines = [];
      vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
        lines.push(args.map(String).join(' '));
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should print the override note', () => {
      displayTarget(target, 'Target');

      expect(lines).toContain('Remote branch: develop (develop)');
      expect(lines).toContain("ℹ️  Override active: 'feature/login' redirected to 'develop'");
      expect(lines.some(line => line.startsWith('Region:'))).toBe(false);
    });

    it('should print the interactive fallback note', () => {
      displayTarget({ ...target, isOverride: false, isFallback: true, resolvedVia: 'interactive-fallback' }, 'Target');

      expect(lines).toContain('ℹ️  No exact match; using the fallback branch you selected');
    });
  });
});
