import { readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { ENV_SCHEMAS, type EnvService } from "../packages/shared/src/env/schema";
import { getMissingEnvVars } from "../packages/shared/src/env/validator";

type TemplateConfig = {
  description: string;
  path: string;
};

const TEMPLATE_MAP: Record<EnvService, TemplateConfig> = {
  cli: { description: "broker CLI env", path: "env/.env.cli" },
  seed: { description: "precomputed seeding env", path: "env/.env.seed" }
};

const ROOT_TEMPLATE = ".env.example";

function readTemplate(relativePath: string): Record<string, string> {
  const absolutePath = path.resolve(process.cwd(), relativePath);
  return parse(readFileSync(absolutePath, "utf8"));
}

function main() {
  const failures: string[] = [];
  const services = Object.keys(ENV_SCHEMAS).filter((key): key is EnvService => key in TEMPLATE_MAP);
  const rootValues = readTemplate(ROOT_TEMPLATE);

  services.forEach(service => {
    const templateValues = readTemplate(TEMPLATE_MAP[service].path);
    const missing = getMissingEnvVars(service, templateValues);
    if (missing.length) {
      failures.push(`${TEMPLATE_MAP[service].description}: missing ${missing.join(", ")}`);
    }
    const undocumented = Object.keys(templateValues).filter(name => !(name in rootValues));
    if (undocumented.length) {
      failures.push(`${ROOT_TEMPLATE}: does not document ${undocumented.join(", ")}`);
    }
  });

  if (failures.length) {
    console.error("Environment template validation failed:\n");
    failures.forEach(failure => console.error(` • ${failure}`));
    process.exitCode = 1;
    return;
  }

  console.log("All environment templates satisfy the schema:", services.join(", "));
}

main();
