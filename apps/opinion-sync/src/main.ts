import { runCli } from './runCli';

async function main() {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
