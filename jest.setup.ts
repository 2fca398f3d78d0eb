// quiet structured logs during tests unless a run asks for them
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent'
