import "dotenv/config";
import { loadConfig } from "./config.js";
import { log, logError, setQuiet } from "./log.js";
import { runRollouts } from "./rollout.js";

async function main(): Promise<void> {
  const config = loadConfig();
  setQuiet(config.quiet);
  log(
    `Config: hands=${config.hands} seed=${config.seed} players=${config.minPlayers}-${config.maxPlayers} ` +
      `blinds=${config.smallBlind}/${config.bigBlind} agents=${config.agents.join(",")}`
  );

  const started = Date.now();
  const summary = runRollouts(config, {
    onHand: (result) => {
      if (result.handId % 1000 === 0) log(`played ${result.handId}/${config.hands} hands`);
    }
  });
  const elapsed = (Date.now() - started) / 1000;

  const bb = Number(config.bigBlind);
  log(
    `Done: ${summary.hands} hands, ${summary.steps} steps, ${summary.showdowns} showdowns, ` +
      `${summary.sanitized} sanitized actions in ${elapsed.toFixed(2)}s`
  );
  for (const [name, totals] of Object.entries(summary.byAgent)) {
    const perHand = totals.hands > 0 ? totals.reward / bb / totals.hands : 0;
    console.log(
      `${name}: hands=${totals.hands} reward=${totals.reward} bb/hand=${perHand.toFixed(3)} penalties=${totals.penalties}`
    );
  }
  summary.rewards.forEach((reward, id) => console.log(`player ${id}: reward=${reward}`));
}

main().catch((err) => {
  logError("Fatal", err);
  process.exit(1);
});
