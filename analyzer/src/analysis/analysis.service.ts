import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigurationError } from "@battery-savings/domain";
import type { SavingsSummary } from "@battery-savings/domain";

import { RuntimeConfigService } from "../config/runtime-config.service";
import { SimulationConfigFactory } from "../config/simulation-config.factory";
import { ReadingLoaderService } from "../input/reading-loader.service";
import { SimulationService } from "../simulation/simulation.service";
import type { SimulationResult } from "../simulation/simulation.service";
import { SummaryService } from "../simulation/summary.service";
import { EmptyPeriodError } from "../simulation/window-segmenter";
import { ViewerService } from "../visualization/viewer.service";

export interface AnalysisOutcome {
  summary: SavingsSummary;
  report: string;
  viewerPath: string | null;
}

/** Load, simulate, report: one full run for the published runtime configuration. */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(RuntimeConfigService) private readonly runtimeConfig: RuntimeConfigService,
    @Inject(SimulationConfigFactory) private readonly configFactory: SimulationConfigFactory,
    @Inject(ReadingLoaderService) private readonly loader: ReadingLoaderService,
    @Inject(SimulationService) private readonly simulation: SimulationService,
    @Inject(SummaryService) private readonly summaryService: SummaryService,
    @Inject(ViewerService) private readonly viewer: ViewerService,
  ) {
  }

  async run(): Promise<AnalysisOutcome> {
    const document = this.runtimeConfig.getDocument();
    const battery = this.configFactory.createBattery(document);
    const options = this.configFactory.createOptions(document);
    const series = await this.loader.load(this.runtimeConfig.inputFile);

    let result: SimulationResult;
    try {
      result = this.simulation.run(series, battery, options);
    } catch (error) {
      if (error instanceof EmptyPeriodError) {
        throw new ConfigurationError(error.message);
      }
      throw error;
    }

    const report = this.summaryService.format(result.summary);
    let viewerPath: string | null = null;
    const outputDir = this.runtimeConfig.outputDir;
    if (outputDir !== null && result.trace) {
      viewerPath = await this.viewer.write(outputDir, result.trace, {
        capacityWh: result.summary.battery.capacityWh,
        floorWh: result.summary.battery.floorWh,
      }, result.summary.occupancy);
    } else {
      this.logger.verbose("No output directory configured; skipping visualization");
    }
    return {summary: result.summary, report, viewerPath};
  }
}
