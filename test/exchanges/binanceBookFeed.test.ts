import { describe, it, expect } from 'vitest';
import { BinanceBookFeed } from '../../src/exchanges/binanceBookFeed.js';
import { createMockLogger } from '../helpers.js';

describe('BinanceBookFeed', () => {
  const makeFeed = () => {
    const feed = new BinanceBookFeed(
      { wsUrl: 'wss://stream.example.test/stream', exchange: 'paper', symbolMap: { XAU: 'PAXGUSDT' } },
      createMockLogger()
    );
    feed.track(['BTC', 'XAU']);
    return feed;
  };

  it('maps instruments to stream symbols', () => {
    const feed = makeFeed();
    expect(feed.streamSymbol('BTC')).toBe('btcusdt');
    expect(feed.streamSymbol('XAU')).toBe('paxgusdt');
  });

  it('parses depth frames into book snapshots', () => {
    const frame = JSON.stringify({
      stream: 'paxgusdt@depth20',
      data: { lastUpdateId: 7, bids: [['2400.5', '1.25']], asks: [['2401', '2']] }
    });

    expect(makeFeed().parse(frame, 1234)).toEqual({
      exchange: 'paper',
      symbol: 'XAU',
      bids: [{ price: 2400.5, size: 1.25 }],
      asks: [{ price: 2401, size: 2 }],
      lastUpdateId: 7,
      receivedAt: 1234
    });
  });

  it('ignores frames from streams it did not subscribe to', () => {
    const frame = JSON.stringify({ stream: 'ethusdt@depth20', data: { bids: [], asks: [] } });
    expect(makeFeed().parse(frame)).toBeUndefined();
  });
});
