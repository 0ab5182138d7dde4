import { Module } from "@nestjs/common";
import type { DynamicModule } from "@nestjs/common";

import { AnalysisService } from "./analysis/analysis.service";
import type { AnalyzerConfigDocument } from "./config/config-document";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { SimulationConfigFactory } from "./config/simulation-config.factory";
import { ReadingLoaderService } from "./input/reading-loader.service";
import { SimulationService } from "./simulation/simulation.service";
import { SummaryService } from "./simulation/summary.service";
import { ViewerService } from "./visualization/viewer.service";

const ANALYZER_SERVICES = [
  AnalysisService,
  SimulationConfigFactory,
  ReadingLoaderService,
  SimulationService,
  SummaryService,
  ViewerService,
];

@Module({})
export class AnalyzerServicesModule {
  /** Services of one run, bound to its validated configuration document. */
  static register(document: AnalyzerConfigDocument): DynamicModule {
    return {
      module: AnalyzerServicesModule,
      providers: [
        {provide: RuntimeConfigService, useValue: new RuntimeConfigService(document)},
        ...ANALYZER_SERVICES,
      ],
      exports: [RuntimeConfigService, ...ANALYZER_SERVICES],
    };
  }
}
