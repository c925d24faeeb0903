// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

/**
 * Address parameters of a chain. Elements chains use the unconfidential
 * (unblinded) prefixes.
 */
export interface Network {
  bech32: string;
  pubKeyHash: number;
  scriptHash: number;
  wif: number;
}

export const networks: {
  bitcoin: Network;
  testnet: Network;
  regtest: Network;
  liquid: Network;
  liquidTestnet: Network;
  elementsRegtest: Network;
} = {
  bitcoin: {
    bech32: 'bc',
    pubKeyHash: 0x00,
    scriptHash: 0x05,
    wif: 0x80
  },
  testnet: {
    bech32: 'tb',
    pubKeyHash: 0x6f,
    scriptHash: 0xc4,
    wif: 0xef
  },
  regtest: {
    bech32: 'bcrt',
    pubKeyHash: 0x6f,
    scriptHash: 0xc4,
    wif: 0xef
  },
  liquid: {
    bech32: 'ex',
    pubKeyHash: 57,
    scriptHash: 39,
    wif: 0x80
  },
  liquidTestnet: {
    bech32: 'tex',
    pubKeyHash: 36,
    scriptHash: 19,
    wif: 0xef
  },
  elementsRegtest: {
    bech32: 'ert',
    pubKeyHash: 235,
    scriptHash: 75,
    wif: 0xef
  }
};

/** Convert our Network to the format expected by @scure/btc-signer */
export function toBtcSignerNetwork(network: Network) {
  return {
    bech32: network.bech32,
    pubKeyHash: network.pubKeyHash,
    scriptHash: network.scriptHash,
    wif: network.wif
  };
}
