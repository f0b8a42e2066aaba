/**
 * @fileoverview Registers configuration, providers and services with the DI container.
 * @module src/container/registrations
 */
import { container, type DependencyContainer } from 'tsyringe';

import type { AppConfigType } from '@/config/index.js';
import {
  AnnotationProvider,
  AppConfig,
  DrugProvider,
  DrugTargetService,
} from '@/container/tokens.js';
import {
  ChemblDrugProvider,
  DrugTargetService as DrugTargetServiceClass,
  UniProtAnnotationProvider,
} from '@/services/drug-targets/index.js';

export function registerAll(
  config: AppConfigType,
  target: DependencyContainer = container,
): DependencyContainer {
  target.register(AppConfig, { useValue: config });
  target.register(DrugProvider, { useClass: ChemblDrugProvider });
  target.register(AnnotationProvider, { useClass: UniProtAnnotationProvider });
  target.register(DrugTargetService, { useClass: DrugTargetServiceClass });
  return target;
}
