// Keep test output clean; individual tests may still raise the level.
process.env.LOG_LEVEL = "silent";
