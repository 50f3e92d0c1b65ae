import { Command } from "commander";
import { CliContext, runAction } from "../CliContext";
import {
  COLLISION_CATEGORIES,
  CollisionCategory,
  isCollisionCategory,
} from "../../../domain/protocols/CollisionVectors";
import { TRANSLATION_NAMES } from "../../../domain/scripture/Translation";
import { ValidationError } from "../../../shared/errors/InputErrors";

export function registerInfoCommands(program: Command, context: CliContext): void {
  const { io, config } = context;

  program
    .command("config")
    .description("Show the current configuration")
    .action(() =>
      runAction(context, async () => {
        io.out(
          [
            "Current Configuration",
            "",
            `API Key: ${config.hasApiKey() ? "✓ Set" : "✗ Not set"}`,
            `Model: ${config.openAiModel}`,
            `Default Translation: ${config.defaultTranslation}`,
            `Default Engine: ${config.defaultEngine}`,
            `Output Directory: ${config.outputDirectory}`,
            `Generation Timeout: ${config.generationTimeoutMs}ms`,
            `Length Tolerance: ±${Math.round(config.lengthTolerance * 100)}%`,
            `Translations: ${TRANSLATION_NAMES.join(", ")}`,
          ].join("\n"),
        );
      }),
    );

  program
    .command("protocols")
    .description("Describe the available protocols")
    .action(() =>
      runAction(context, async () => {
        const blocks = context.registry.list().map((protocol) =>
          [
            `${protocol.id} (v${protocol.version}): ${protocol.wordRange.min}-${protocol.wordRange.max} words, ${protocol.readingMinutes} min`,
            `  ${protocol.summary}`,
            `  Sections: ${protocol.requiredSections.join(" → ")}`,
          ].join("\n"),
        );
        io.out(blocks.join("\n\n"));
      }),
    );

  program
    .command("vectors")
    .description("List the collision vectors")
    .argument("[category]", COLLISION_CATEGORIES.join(", "))
    .action((category: string | undefined) =>
      runAction(context, async () => {
        let selected: CollisionCategory | undefined;
        if (category !== undefined) {
          const wanted = category.trim().toLowerCase();
          if (!isCollisionCategory(wanted)) {
            throw new ValidationError(
              `Unknown category "${category}". Choose from: ${COLLISION_CATEGORIES.join(", ")}`,
              "category",
            );
          }
          selected = wanted;
        }

        const catalog = context.vectors.list(selected);
        const blocks = COLLISION_CATEGORIES.flatMap((name) => {
          const options = catalog[name];
          return options
            ? [`${name}:\n${options.map((option) => `  - ${option}`).join("\n")}`]
            : [];
        });
        io.out(blocks.join("\n\n"));
      }),
    );
}
