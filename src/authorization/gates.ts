import type { WorkerKind } from '../domain/worker.js';
import type { AuthorizationGate } from './authorization-gate.js';
import {
  checkBatchPolicy,
  checkBatchQuota,
  checkNeverDidStudy,
  checkNotPreview,
  checkSessionOpen,
} from './batch-policy.js';

// Authors try out their own study; batch quotas don't count them.
const authorGate: AuthorizationGate<'Author'> = {
  kind: 'Author',
  canStart: (input) => checkBatchPolicy(input),
  canContinue: (input) => checkBatchPolicy(input),
};

function singleSessionGate<K extends 'PersonalSingle' | 'GeneralSingle'>(kind: K): AuthorizationGate<K> {
  return {
    kind,
    canStart: (input) =>
      checkBatchPolicy(input)
        .andThen(() => checkBatchQuota(input))
        .andThen(() => checkNeverDidStudy(input)),
    canContinue: (input) => checkBatchPolicy(input).andThen(() => checkSessionOpen(input)),
  };
}

function multipleSessionGate<K extends 'PersonalMultiple' | 'GeneralMultiple'>(kind: K): AuthorizationGate<K> {
  return {
    kind,
    canStart: (input) => checkBatchPolicy(input).andThen(() => checkBatchQuota(input)),
    canContinue: (input) => checkBatchPolicy(input),
  };
}

const mturkGate: AuthorizationGate<'MTurk'> = {
  kind: 'MTurk',
  canStart: (input) =>
    checkNotPreview(input)
      .andThen(() => checkBatchPolicy(input))
      .andThen(() => checkBatchQuota(input))
      .andThen(() => checkNeverDidStudy(input)),
  canContinue: (input) => checkBatchPolicy(input).andThen(() => checkSessionOpen(input)),
};

// The sandbox is for trying HITs out, so repeats are fine.
const mturkSandboxGate: AuthorizationGate<'MTurkSandbox'> = {
  kind: 'MTurkSandbox',
  canStart: (input) =>
    checkNotPreview(input)
      .andThen(() => checkBatchPolicy(input))
      .andThen(() => checkBatchQuota(input)),
  canContinue: (input) => checkBatchPolicy(input),
};

export const AUTHORIZATION_GATES: { readonly [K in WorkerKind]: AuthorizationGate<K> } = {
  Author: authorGate,
  PersonalSingle: singleSessionGate('PersonalSingle'),
  PersonalMultiple: multipleSessionGate('PersonalMultiple'),
  GeneralSingle: singleSessionGate('GeneralSingle'),
  GeneralMultiple: multipleSessionGate('GeneralMultiple'),
  MTurk: mturkGate,
  MTurkSandbox: mturkSandboxGate,
};

export function authorizationGateFor(kind: WorkerKind): AuthorizationGate {
  return AUTHORIZATION_GATES[kind];
}
