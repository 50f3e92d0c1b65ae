import type { IConfig } from "../../shared/config/IConfig";
import type { ProtocolRegistry } from "../../domain/protocols/ProtocolRegistry";
import type { CollisionVectorCatalog } from "../../domain/protocols/CollisionVectors";
import type { GenerateStudyUseCase } from "../../application/studies/use-cases/GenerateStudyUseCase";
import type { ListStudiesUseCase } from "../../application/studies/use-cases/ListStudiesUseCase";
import type { GetStudyUseCase } from "../../application/studies/use-cases/GetStudyUseCase";
import type { ErrorReporter } from "./ErrorReporter";
import type { CliIO } from "./CliIO";

/** What every command can reach */
export interface CliContext {
  config: IConfig;
  registry: ProtocolRegistry;
  vectors: CollisionVectorCatalog;
  generateStudy: GenerateStudyUseCase;
  listStudies: ListStudiesUseCase;
  getStudy: GetStudyUseCase;
  reporter: ErrorReporter;
  io: CliIO;
  /** Aborted on SIGINT */
  signal: AbortSignal;
}

/** Run a command body, turning any failure into a report and exit code */
export async function runAction(
  context: CliContext,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    context.io.setExitCode(context.reporter.report(error));
  }
}
