#!/usr/bin/env node_modules/.bin/tsx

import fs from "fs";
import path from "path";
import yargs from "yargs";
import { selectShaderTargets } from "../src/config/shaderTargets";
import { generateShaderSources } from "../src/core/graphics/shading/ShaderSources";
import { QuadShading } from "../src/ui/QuadShading";

interface GenerateOptions {
  out: string;
  target: string;
  hexLiterals?: boolean;
  nativeUnpack?: boolean;
  dryRun: boolean;
}

function generateShaders(options: GenerateOptions): void {
  const outDir = path.resolve(options.out);

  const targets = selectShaderTargets(options.target, {
    hexIntLiterals: options.hexLiterals,
    unpackUnorm4x8: options.nativeUnpack,
  });

  for (const target of targets) {
    const { files, slots } = generateShaderSources(QuadShading, target);

    console.log(`Target ${target.name} (${target.language}):`);
    for (const slot of slots) {
      const sampler = slot.combinedSampler ? ` + ${slot.combinedSampler}` : "";
      console.log(`  ${slot.type} ${slot.name}${sampler}: group ${slot.group}, binding ${slot.binding}`);
    }

    for (const file of files) {
      if (options.dryRun) {
        console.log(`// ${file.fileName}\n${file.source}`);
        continue;
      }
      if (!fs.existsSync(outDir)) {
        fs.mkdirSync(outDir, { recursive: true });
        console.log(`Created directory: ${outDir}`);
      }
      const filePath = path.join(outDir, file.fileName);
      fs.writeFileSync(filePath, file.source);
      console.log(`  wrote ${filePath}`);
    }
  }
}

async function main() {
  const argv = await yargs(process.argv.slice(2))
    .scriptName("generate-shaders")
    .usage("Generate WGSL and GLSL ES 3.00 sources for the quad shading program")
    .help()
    .option("out", {
      alias: "o",
      describe: "Output directory",
      type: "string",
      default: "generated/shaders",
    })
    .option("target", {
      alias: "t",
      describe: "Which backend to generate for",
      choices: ["wgsl", "glsl", "all"],
      default: "all",
    })
    .option("hex-literals", {
      describe: "Override whether integer masks are written in hex",
      type: "boolean",
    })
    .option("native-unpack", {
      describe: "Override whether the native unorm unpack builtin is used (WGSL only)",
      type: "boolean",
    })
    .option("dry-run", {
      describe: "Print the sources instead of writing them",
      type: "boolean",
      default: false,
    })
    .example("$0 --target wgsl --out dist/shaders", "Write quad.wgsl to dist/shaders")
    .example("$0 --target glsl --no-hex-literals --dry-run", "Print GLSL with decimal masks")
    .strict().argv;

  try {
    generateShaders({
      out: argv.out,
      target: argv.target,
      hexLiterals: argv.hexLiterals,
      nativeUnpack: argv.nativeUnpack,
      dryRun: argv.dryRun,
    });
  } catch (error) {
    console.error("Failed to generate shaders:", error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
