import dotenv from 'dotenv'

dotenv.config({ path: '.env.local' })
dotenv.config()

import { startServer } from './server'

startServer().catch((error) => {
  console.error('Failed to start server:', error)
  process.exit(1)
})
