import type { PreflightCheck, PreflightCheckName, ValidationResult } from './types.js';

function pass(name: PreflightCheckName): ValidationResult {
  return { name, passed: true, errors: [], remediation: [] };
}

function fail(name: PreflightCheckName, error: string, remediation: string[] = []): ValidationResult {
  return { name, passed: false, errors: [error], remediation };
}

export const repositoryCheck: PreflightCheck = {
  name: 'repository',
  async validate({ backend }) {
    const result = await backend.isValidRepository();
    if (!result.ok) {
      return fail(this.name, `invalid repository: ${result.reason}`, [
        'Run rebranch from inside a git work tree whose current branch has at least one commit',
      ]);
    }
    return pass(this.name);
  },
};

export const noActiveOperationCheck: PreflightCheck = {
  name: 'no-active-operation',
  async validate({ store }) {
    if (await store.exists()) {
      return fail(this.name, 'rebranch operation already in progress', [
        'Continue: rebranch --continue (after resolving conflicts)',
        'Complete: rebranch --done (if cherry-picking finished)',
        'Cancel: rebranch --abort (revert to original state)',
      ]);
    }
    return pass(this.name);
  },
};

export const noForeignOperationCheck: PreflightCheck = {
  name: 'no-foreign-operation',
  async validate({ backend }) {
    const operation = await backend.detectForeignOperation();
    if (operation) {
      return fail(this.name, `cannot start rebranch: ${operation.kind} operation is in progress`, [
        'View status: git status',
        `Complete or abort the current ${operation.kind} operation`,
        'Then retry rebranch',
      ]);
    }
    return pass(this.name);
  },
};

export const cleanWorkingTreeCheck: PreflightCheck = {
  name: 'clean-working-tree',
  async validate({ backend, transition }) {
    if (await backend.isWorkingTreeClean()) return pass(this.name);

    switch (transition) {
      case 'continue':
        return fail(this.name, 'working directory is not clean', [
          'Resolve the conflicted files and stage them: git add <files>',
          'Commit the resolution: git cherry-pick --continue (or git commit)',
          'Then run: rebranch --continue',
        ]);
      case 'finish':
        return fail(this.name, 'working directory is not clean', [
          'Commit any remaining changes before finishing',
        ]);
      default:
        return fail(this.name, 'working directory is not clean', [
          'Commit changes: git add . && git commit -m "Your message"',
          'Or stash changes: git stash',
          'Check status: git status',
        ]);
    }
  },
};

export const baseBranchExistsCheck: PreflightCheck = {
  name: 'base-branch-exists',
  async validate({ backend, baseBranch }) {
    if (!baseBranch) {
      return fail(this.name, 'no base branch given', ['Usage: rebranch <base-branch>']);
    }
    if (!(await backend.branchExists(baseBranch))) {
      return fail(this.name, `base branch '${baseBranch}' does not exist`, [
        'Check branch name spelling',
        "Run 'git branch -a' to see all available branches",
        `Create the branch: git checkout -b ${baseBranch}`,
      ]);
    }
    return pass(this.name);
  },
};

export const onBranchCheck: PreflightCheck = {
  name: 'on-branch',
  async validate({ backend }) {
    if ((await backend.currentBranch()) === null) {
      return fail(this.name, 'HEAD is detached; rebranch needs a branch to rewrite', [
        'Switch to the branch you want to rebranch: git checkout <branch-name>',
      ]);
    }
    return pass(this.name);
  },
};

export const distinctBranchesCheck: PreflightCheck = {
  name: 'distinct-branches',
  async validate({ backend, baseBranch }) {
    const current = await backend.currentBranch();
    if (current !== null && current === baseBranch) {
      return fail(this.name, `current branch '${current}' is the same as base branch '${baseBranch}'`, [
        'Create a feature branch: git checkout -b feature-branch',
        'Or switch to a different branch: git checkout <branch-name>',
      ]);
    }
    return pass(this.name);
  },
};

export const activeOperationCheck: PreflightCheck = {
  name: 'active-operation',
  async validate({ store }) {
    if (!(await store.exists())) {
      return fail(this.name, 'no rebranch operation in progress', [
        'Start one with: rebranch <base-branch>',
      ]);
    }
    return pass(this.name);
  },
};

export const resumableStageCheck: PreflightCheck = {
  name: 'resumable-stage',
  async validate({ record }) {
    const { stage } = await record();
    if (stage === 'done') {
      return fail(this.name, `rebranch is not waiting for conflict resolution (current stage: ${stage})`, [
        'All commits are applied. Finish with: rebranch --done',
      ]);
    }
    return pass(this.name);
  },
};

export const finishableStageCheck: PreflightCheck = {
  name: 'finishable-stage',
  async validate({ record }) {
    const { stage } = await record();
    if (stage !== 'done') {
      return fail(this.name, `rebranch is not ready to finish (current stage: ${stage})`, [
        'Resolve any conflicts, then run: rebranch --continue',
      ]);
    }
    return pass(this.name);
  },
};

export const onTempBranchCheck: PreflightCheck = {
  name: 'on-temp-branch',
  async validate({ backend, record }) {
    const { tempBranch } = await record();
    const current = await backend.currentBranch();
    if (current !== tempBranch) {
      return fail(this.name, `expected to be on temp branch '${tempBranch}', but on '${current ?? 'detached HEAD'}'`, [
        `Switch back: git checkout ${tempBranch}`,
      ]);
    }
    return pass(this.name);
  },
};
