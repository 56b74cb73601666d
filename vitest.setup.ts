// Keep module-level loggers quiet unless a test opts in through configureLogging().
process.env.LOG_LEVEL = "silent";
