export { PaperBroker } from './paper-broker'
export type { PaperBrokerOptions, PaperFill } from './paper-broker'
export type { BrokerAdapter, BrokerOrder, BrokerOrderResult } from './types'
