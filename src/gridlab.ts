/*

  Gridlab replays an asymmetric grid strategy (buy a fixed amount on a daily drop,
  sell a fixed amount on a daily rise) over historical daily closes and reports
  how it would have performed.

  Disclaimer: backtests describe the past. They are not investment advice.

*/

import { gridlabPipeline } from '@services/core/pipeline/pipeline';
import { error, info } from '@services/logger';
import { logVersion } from '@utils/process/process.utils';

export const main = async () => {
  try {
    info('init', logVersion());
    await gridlabPipeline();
  } catch (e) {
    error('init', e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
};

await main();
