// Service loggers stay quiet under test unless LOG_LEVEL asks otherwise.
process.env.LOG_LEVEL ??= "silent";
