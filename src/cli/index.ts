import { Command } from "commander";
import { runBuildCli } from "./commands/build";

const program = new Command();

program
  .name("kiln")
  .description("Kiln – builds the assets an HTML page declares and rewrites the page to use them")
  .version("0.1.0");

program
  .command("build")
  .description("Build the assets declared in an HTML file into the dist directory")
  .argument("[target]", "HTML file to build (default: index.html)")
  .option("-d, --dist <dir>", "Output directory")
  .option("--public-url <url>", "URL the output directory is served from")
  .option("--release", "Build in release mode")
  .option("--no-filehash", "Keep original file names instead of content hashes")
  .option("--aggregate-errors", "Let every asset finish and report all failures")
  .action(runBuildCli);

program.parse(process.argv);
