import { loadEnv } from "../../src/config/env";
import { createServices } from "../../src/pipeline/factory";

async function main() {
  const question = process.argv.slice(2).join(" ").trim() || process.env.FLOAT_QUESTION;
  if (!question) {
    console.error("Usage: tsx scripts/manual/askQuestion.ts <question>");
    process.exit(1);
  }

  const services = createServices(loadEnv());
  try {
    const answer = await services.orchestrator.ask(question);
    console.log(JSON.stringify(answer, null, 2));
  } finally {
    await services.pool?.end();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
