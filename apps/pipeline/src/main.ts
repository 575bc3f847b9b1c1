import { runPipeline, reportFatal } from './app';

runPipeline(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    reportFatal(error);
    process.exitCode = 1;
  });
