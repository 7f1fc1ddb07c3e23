export { WebrootResponder, StandaloneHttpResponder } from './http-01.js';
export { TlsAlpnResponder, ACME_TLS_ALPN_PROTOCOL } from './tls-alpn-01.js';
export { DnsResponder } from './dns-01.js';
