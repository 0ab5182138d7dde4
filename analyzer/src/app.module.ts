import { Module } from "@nestjs/common";
import type { DynamicModule } from "@nestjs/common";

import { AnalyzerServicesModule } from "./analyzer-services.module";
import type { AnalyzerConfigDocument } from "./config/config-document";

@Module({})
export class AppModule {
  static forDocument(document: AnalyzerConfigDocument): DynamicModule {
    return {
      module: AppModule,
      imports: [AnalyzerServicesModule.register(document)],
    };
  }
}
