import { Command } from "commander";
import { CliContext, runAction } from "../CliContext";

export function registerStudyCommands(program: Command, context: CliContext): void {
  const { io } = context;

  program
    .command("list")
    .description("List saved studies, newest first")
    .option("--reference <citation>", "only studies of this reference")
    .action((options: { reference?: string }) =>
      runAction(context, async () => {
        const studies = await context.listStudies.execute({
          reference: options.reference,
        });

        if (studies.length === 0) {
          io.out("No saved studies found");
          return;
        }

        const rows = studies.map((study, i) =>
          [
            `${i + 1}. [${study.engine}] ${study.reference}`,
            `   Date: ${study.date}`,
            `   Words: ${study.wordCount}${study.lengthOutOfRange ? " (outside protocol range)" : ""}`,
            `   Slug: ${study.slug}`,
            `   File: ${study.filePath}`,
          ].join("\n"),
        );
        io.out(rows.join("\n\n"));
      }),
    );

  program
    .command("show")
    .description("Print a saved study")
    .argument("<slug-or-path>", "slug from `list`, or the study's .md path")
    .action((slugOrPath: string) =>
      runAction(context, async () => {
        const study = await context.getStudy.execute(slugOrPath);
        io.out(study.document);
      }),
    );
}
