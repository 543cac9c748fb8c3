export { ACK, asyncPacket, FakeRemote, nack, type Reply, type Responder, syncMessage } from './fake-remote.js'
export { RecordingObserver } from './recording-observer.js'
