import * as esbuild from "esbuild";

const isWatch = process.argv.includes("--watch");

const cliConfig: esbuild.BuildOptions = {
  entryPoints: ["./src/main.ts"],
  bundle: true,
  outfile: "./dist/kdlgen.js",
  platform: "node",
  target: "node20",
  format: "esm",
  external: ["yaml", "zod"],
  sourcemap: true,
};

async function build(): Promise<void> {
  if (isWatch) {
    const ctx = await esbuild.context(cliConfig);
    await ctx.watch();
    console.info("Watching for changes...");
  } else {
    await esbuild.build(cliConfig);
    console.info("Build complete");
  }
}

build().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
