import { loadAnalysisConfig } from "../config/analysisConfig";
import { loadDatasetFromFolder } from "../dataset/loadDataset";
import { runSalesForecast } from "../forecast/runSalesForecast";
import { formatCurrency } from "../report/format";
import { summarizeForecast } from "../report/summaries";
import { getArg, getIntArg, getPositionalArgs } from "./_args";

function usage() {
  console.log("Usage: npm run forecast -- <data-folder> [--horizon N] [--category TYPE]");
}

async function main() {
  const config = loadAnalysisConfig();
  const folder = getPositionalArgs()[0];
  if (!folder) {
    usage();
    process.exit(1);
  }

  const dataset = loadDatasetFromFolder(folder);
  const run = runSalesForecast(dataset.integrated, {
    horizon: getIntArg("--horizon", config.forecastHorizon),
    category: getArg("--category") ?? null,
  });

  for (const warning of run.warnings) console.warn(`Warning: ${warning}`);
  for (const line of summarizeForecast(run, config.currency)) console.log(line);

  if (run.seasonalArima.ok) {
    const { futureMonths, futureForecast } = run.seasonalArima.value;
    console.log("Seasonal ARIMA future forecast:");
    futureMonths.forEach((month, i) => {
      console.log(`  ${month}: ${formatCurrency(futureForecast[i], config.currency)}`);
    });
  }
  if (run.trendSeasonal.ok) {
    const { futureMonths, futureForecast, futureLower, futureUpper } = run.trendSeasonal.value;
    console.log("Trend-seasonal future forecast (80% interval):");
    futureMonths.forEach((month, i) => {
      console.log(
        `  ${month}: ${formatCurrency(futureForecast[i], config.currency)} ` +
          `[${formatCurrency(futureLower[i], config.currency)} - ${formatCurrency(futureUpper[i], config.currency)}]`
      );
    });
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
