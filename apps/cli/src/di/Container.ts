import "reflect-metadata";
import { DependencyContainer, container, instanceCachingFactory } from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";
import { Clock, systemClock } from "../shared/clock";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Protocols
import { ProtocolRegistry } from "../domain/protocols/ProtocolRegistry";
import { CollisionVectorCatalog } from "../domain/protocols/CollisionVectors";

// Text sources
import { IHtmlFetcher, UndiciHtmlFetcher } from "../infrastructure/scripture/HtmlFetcher";
import { BibleGatewayPassageSource } from "../infrastructure/scripture/BibleGatewayPassageSource";
import { LectionaryCalendarSource } from "../infrastructure/scripture/LectionaryCalendarSource";
import { ICalendarSource, IPassageSource } from "../domain/scripture/ITextSource";

// Generation
import {
  ChatCompletionCreator,
  OpenAIGenerationBackend,
  createOpenAIClient,
} from "../infrastructure/ai/OpenAIGenerationBackend";
import { IGenerationBackend } from "../domain/studies/services/IGenerationBackend";

// Persistence
import { IStudyRepository } from "../domain/studies/repositories/IStudyRepository";
import { FileStudyRepository } from "../infrastructure/persistence/filesystem/FileStudyRepository";

// Domain Services
import { ReferenceResolver } from "../domain/scripture/ReferenceResolver";
import { PromptRenderer } from "../domain/studies/services/PromptRenderer";
import { GenerationClient } from "../domain/studies/services/GenerationClient";
import { ArtifactValidator } from "../domain/studies/services/ArtifactValidator";
import { ArtifactWriter } from "../domain/studies/services/ArtifactWriter";

// Use Cases
import { GenerateStudyUseCase } from "../application/studies/use-cases/GenerateStudyUseCase";
import { ListStudiesUseCase } from "../application/studies/use-cases/ListStudiesUseCase";
import { GetStudyUseCase } from "../application/studies/use-cases/GetStudyUseCase";

export interface ContainerOverrides {
  config?: IConfig;
  logger?: ILogger;
  clock?: Clock;
}

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations. Protocol and
 * vector files are read once, here, so a broken definition fails at
 * startup rather than mid-run.
 */
export class DIContainer {
  static initialize(overrides: ContainerOverrides = {}): DependencyContainer {
    // Configuration
    container.registerInstance<IConfig>(
      TYPES.Config,
      overrides.config ?? new EnvConfig(),
    );
    container.registerInstance<Clock>(TYPES.Clock, overrides.clock ?? systemClock);

    // Logging
    container.registerInstance<ILogger>(
      TYPES.Logger,
      overrides.logger ?? new PinoLogger(),
    );

    // Protocols
    container.registerInstance(TYPES.ProtocolRegistry, ProtocolRegistry.load());
    container.registerInstance(TYPES.CollisionVectors, CollisionVectorCatalog.load());

    // Text sources
    container.registerSingleton<IHtmlFetcher>(TYPES.HtmlFetcher, UndiciHtmlFetcher);
    container.registerSingleton<IPassageSource>(
      TYPES.PassageSource,
      BibleGatewayPassageSource,
    );
    container.registerSingleton<ICalendarSource>(
      TYPES.CalendarSource,
      LectionaryCalendarSource,
    );

    // Generation
    container.register<ChatCompletionCreator | null>(TYPES.ChatCompletions, {
      useFactory: instanceCachingFactory(
        (c) => createOpenAIClient(c.resolve<IConfig>(TYPES.Config))?.chat.completions ?? null,
      ),
    });
    container.registerSingleton<IGenerationBackend>(
      TYPES.GenerationBackend,
      OpenAIGenerationBackend,
    );

    // Repositories
    container.registerSingleton<IStudyRepository>(
      TYPES.StudyRepository,
      FileStudyRepository,
    );

    // Domain Services
    container.registerSingleton(TYPES.ReferenceResolver, ReferenceResolver);
    container.registerSingleton(TYPES.PromptRenderer, PromptRenderer);
    container.registerSingleton(TYPES.GenerationClient, GenerationClient);
    container.registerSingleton(TYPES.ArtifactValidator, ArtifactValidator);
    container.registerSingleton(TYPES.ArtifactWriter, ArtifactWriter);

    // Use Cases
    container.register(TYPES.GenerateStudyUseCase, {
      useClass: GenerateStudyUseCase,
    });
    container.register(TYPES.ListStudiesUseCase, {
      useClass: ListStudiesUseCase,
    });
    container.register(TYPES.GetStudyUseCase, {
      useClass: GetStudyUseCase,
    });

    return container;
  }

  static getContainer(): DependencyContainer {
    return container;
  }
}

export { container };
