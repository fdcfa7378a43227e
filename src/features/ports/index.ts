export { parsePorts, describePorts, MAX_PORT } from './port-utils'
