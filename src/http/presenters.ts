import type { ComponentRun, StudyRun } from '../domain/runs.js';
import type { Component } from '../domain/study.js';
import type { InitData } from '../use-cases/retrieve-init-data.js';

// Result data never goes back out; clients only see state.

export function presentStudyRun(run: StudyRun) {
  return {
    id: run.id,
    studyId: run.studyId,
    batchId: run.batchId,
    workerId: run.workerId,
    state: run.state,
    confirmationCode: run.confirmationCode,
    errorMessage: run.errorMessage,
    startTime: run.startTime,
    endTime: run.endTime,
  };
}

export function presentComponentRun(componentRun: ComponentRun, component: Component) {
  return {
    id: componentRun.id,
    componentId: component.id,
    componentTitle: component.title,
    position: componentRun.position,
    reloadable: component.reloadable,
    state: componentRun.state,
    startTime: componentRun.startTime,
    endTime: componentRun.endTime,
  };
}

export function presentInitData(init: InitData) {
  return {
    studyRunId: init.studyRun.id,
    studyId: init.study.id,
    studyTitle: init.study.title,
    batchId: init.batch.id,
    batchTitle: init.batch.title,
    workerId: init.worker.id,
    workerType: init.worker.kind,
    componentRunId: init.componentRun.id,
    componentId: init.component.id,
    componentTitle: init.component.title,
    componentPosition: init.componentRun.position,
  };
}
