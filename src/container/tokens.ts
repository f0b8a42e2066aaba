/**
 * @fileoverview Injection tokens for the DI container.
 * @module src/container/tokens
 */

export const AppConfig = Symbol('AppConfig');
export const DrugProvider = Symbol('IDrugProvider');
export const AnnotationProvider = Symbol('IAnnotationProvider');
export const DrugTargetService = Symbol('DrugTargetService');
