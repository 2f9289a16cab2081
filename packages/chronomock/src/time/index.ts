export {
  createChannel,
  type BoundedChannel,
  type ChannelOptions,
  type Sender,
  type Receiver,
  type TrySendError,
  type TryRecvError,
} from "./channel";
export {
  SystemTicker,
  MockTicker,
  type Ticker,
  type TickerFactory,
  type MockTickerError,
} from "./ticker";
export {
  SystemTimer,
  MockTimer,
  DURATION_CHANNEL_CAPACITY,
  type TimerFactory,
} from "./timer";
