#!/usr/bin/env node
import "reflect-metadata";
import dotenv from "dotenv";

dotenv.config();

import { DIContainer } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { PinoLogger } from "./infrastructure/logging/PinoLogger";
import { ProtocolRegistry } from "./domain/protocols/ProtocolRegistry";
import { CollisionVectorCatalog } from "./domain/protocols/CollisionVectors";
import { GenerateStudyUseCase } from "./application/studies/use-cases/GenerateStudyUseCase";
import { ListStudiesUseCase } from "./application/studies/use-cases/ListStudiesUseCase";
import { GetStudyUseCase } from "./application/studies/use-cases/GetStudyUseCase";
import { buildProgram } from "./presentation/cli/program";
import { ErrorReporter } from "./presentation/cli/ErrorReporter";
import { processIO } from "./presentation/cli/CliIO";

async function main(argv: string[]): Promise<void> {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  let reporter: ErrorReporter | undefined;

  try {
    const container = DIContainer.initialize();
    const logger = container.resolve<ILogger>(TYPES.Logger);
    reporter = new ErrorReporter(logger, processIO.err);

    const program = buildProgram({
      config: container.resolve<IConfig>(TYPES.Config),
      registry: container.resolve<ProtocolRegistry>(TYPES.ProtocolRegistry),
      vectors: container.resolve<CollisionVectorCatalog>(TYPES.CollisionVectors),
      generateStudy: container.resolve<GenerateStudyUseCase>(TYPES.GenerateStudyUseCase),
      listStudies: container.resolve<ListStudiesUseCase>(TYPES.ListStudiesUseCase),
      getStudy: container.resolve<GetStudyUseCase>(TYPES.GetStudyUseCase),
      reporter,
      io: processIO,
      signal: controller.signal,
    });

    await program.parseAsync(argv);
  } catch (error) {
    const fallback = reporter ?? new ErrorReporter(new PinoLogger(), processIO.err);
    processIO.setExitCode(fallback.report(error));
  }
}

void main(process.argv);
