import { Command } from "commander";
import { CliContext, runAction } from "../CliContext";
import { GenerateStudyDto, GeneratedStudyDto } from "../../../application/studies/dto/GenerateStudyDto";
import { StudyPreferences } from "../../../domain/studies/value-objects/StudyPreferences";
import type { ResolveInput } from "../../../domain/scripture/ReferenceResolver";
import { isRclSlot, RCL_SLOTS } from "../../../domain/scripture/ReferenceResolver";
import { Translation, parseTranslation } from "../../../domain/scripture/Translation";
import { ValidationError } from "../../../shared/errors/InputErrors";

interface GenerationOptions {
  length?: string;
  tone?: string;
  language?: string;
  focus?: string;
  vector?: string;
}

interface TranslationOption {
  translation?: string;
}

function withGenerationOptions(command: Command): Command {
  return command
    .option("--length <length>", "study length: short, medium or long")
    .option("--tone <level>", "0 (academic) to 8 (devotional)")
    .option("--language <level>", "accessible, standard or advanced")
    .option("--focus <areas>", "themes to emphasize")
    .option("--vector <vector>", "use this collision vector (collision protocol only)");
}

export function preferencesFrom(options: GenerationOptions): StudyPreferences {
  let toneLevel: number | undefined;
  if (options.tone !== undefined) {
    toneLevel = Number(options.tone.trim());
    if (options.tone.trim() === "" || Number.isNaN(toneLevel)) {
      throw new ValidationError(`Tone level must be a number, got "${options.tone}"`, "toneLevel");
    }
  }

  return StudyPreferences.create({
    length: options.length,
    toneLevel,
    language: options.language,
    focusAreas: options.focus,
  });
}

function translationFrom(options: TranslationOption): Translation | undefined {
  return options.translation === undefined
    ? undefined
    : parseTranslation(options.translation);
}

async function generate(
  context: CliContext,
  engine: string | undefined,
  input: ResolveInput,
  options: GenerationOptions,
): Promise<void> {
  const { io } = context;
  const protocol = context.registry.get(engine ?? context.config.defaultEngine);

  io.err(`═══ Lectionary Engines: ${protocol.displayName.toUpperCase()} ═══`);
  io.err("Generating study... this may take a few minutes.");

  const result = await context.generateStudy.execute(
    new GenerateStudyDto(
      protocol.id,
      input,
      preferencesFrom(options),
      options.vector,
      context.signal,
    ),
  );

  io.out(result.artifact.document);
  reportSaved(context, result);
}

function reportSaved(context: CliContext, result: GeneratedStudyDto): void {
  const { io } = context;

  if (result.collisionVectors) {
    io.err("Collision vectors:");
    for (const [category, vector] of Object.entries(result.collisionVectors)) {
      io.err(`  ${category}: ${vector}`);
    }
  }

  const warning = result.lengthWarning;
  if (warning) {
    io.err(
      `! Length ${warning.wordCount} words is outside ${warning.allowed.min}-${warning.allowed.max} ` +
        `(protocol range ${warning.nominal.min}-${warning.nominal.max}); saved anyway.`,
    );
  }

  io.err(`✓ Study saved to: ${result.artifact.filePath}`);
}

export function registerGenerateCommands(program: Command, context: CliContext): void {
  withGenerationOptions(
    program
      .command("run")
      .description("Generate a study of a passage")
      .argument("<engine>", "threshold, palimpsest or collision")
      .argument("<reference...>", 'biblical reference, e.g. "John 3:16-21"')
      .option("-t, --translation <translation>", "Bible translation"),
  ).action((engine: string, reference: string[], options: GenerationOptions & TranslationOption) =>
    runAction(context, () =>
      generate(
        context,
        engine,
        {
          kind: "explicit",
          citation: reference.join(" "),
          translation: translationFrom(options),
        },
        options,
      ),
    ),
  );

  withGenerationOptions(
    program
      .command("moravian")
      .description("Generate a study of today's Moravian Daily Texts")
      .argument("[engine]", "threshold, palimpsest or collision (default: DEFAULT_ENGINE)")
      .option("-t, --translation <translation>", "Bible translation"),
  ).action((engine: string | undefined, options: GenerationOptions & TranslationOption) =>
    runAction(context, () =>
      generate(context, engine, { kind: "moravian", translation: translationFrom(options) }, options),
    ),
  );

  withGenerationOptions(
    program
      .command("rcl")
      .description("Generate a study of today's Revised Common Lectionary reading")
      .argument("[engine]", "threshold, palimpsest or collision (default: DEFAULT_ENGINE)")
      .option("-r, --reading <slot>", `reading: ${RCL_SLOTS.join(", ")}`, "gospel")
      .option("-t, --translation <translation>", "Bible translation"),
  ).action(
    (
      engine: string | undefined,
      options: GenerationOptions & TranslationOption & { reading: string },
    ) =>
      runAction(context, async () => {
        const slot = options.reading.trim().toLowerCase();
        if (!isRclSlot(slot)) {
          throw new ValidationError(
            `Invalid reading "${options.reading}". Choose from: ${RCL_SLOTS.join(", ")}`,
            "reading",
          );
        }
        await generate(
          context,
          engine,
          { kind: "rcl", slot, translation: translationFrom(options) },
          options,
        );
      }),
  );

  withGenerationOptions(
    program
      .command("paste")
      .description("Generate a study of text pasted on stdin")
      .argument("[engine]", "threshold, palimpsest or collision (default: DEFAULT_ENGINE)")
      .option("-r, --reference <citation>", "citation for the pasted text"),
  ).action((engine: string | undefined, options: GenerationOptions & { reference?: string }) =>
    runAction(context, async () => {
      // Unknown engines fail before the user pastes anything
      context.registry.get(engine ?? context.config.defaultEngine);

      const pasted = await context.io.readPaste(options.reference);
      if (pasted.citation === "") {
        throw new ValidationError("A biblical reference is required", "reference");
      }
      await generate(
        context,
        engine,
        { kind: "paste", citation: pasted.citation, text: pasted.text },
        options,
      );
    }),
  );
}
