// ============================================================
// PositionBook: net exposure per symbol, derived only from
// applied fills.
// ============================================================

import { EventEmitter } from 'events';
import { addQuantity, roundQuantity, type Fill, type OrderSide, type Position } from '../../shared/protocol.js';

/**
 * Emits 'position_update' (Position) after every applied fill.
 */
export class PositionBook extends EventEmitter {
  private positions = new Map<string, Position>();

  /**
   * Current position for a symbol; flat if nothing has traded.
   */
  get(symbol: string): Position {
    const position = this.positions.get(symbol);
    return position
      ? { ...position }
      : { symbol, net_quantity: 0, average_entry_price: 0, realized_pnl: 0, updated_at: 0 };
  }

  getAll(): Position[] {
    return Array.from(this.positions.values(), (p) => ({ ...p }));
  }

  /**
   * Fold a fill into the symbol's position.
   *
   * Adding to a position moves the average entry price; reducing it
   * realizes P&L against that average. A fill that flips the position
   * opens the remainder at the fill price.
   */
  applyFill(symbol: string, side: OrderSide, fill: Fill): Position {
    const current = this.get(symbol);
    const signed = side === 'buy' ? fill.quantity : -fill.quantity;
    const previous = current.net_quantity;
    const net = addQuantity(previous, signed);

    let average = current.average_entry_price;
    let realized = current.realized_pnl;

    if (previous === 0 || Math.sign(previous) === Math.sign(signed)) {
      average = (Math.abs(previous) * average + fill.quantity * fill.price) / Math.abs(net);
    } else {
      const closing = Math.min(Math.abs(previous), fill.quantity);
      realized += closing * (fill.price - average) * Math.sign(previous);
      if (net === 0) {
        average = 0;
      } else if (Math.sign(net) !== Math.sign(previous)) {
        average = fill.price;
      }
    }

    const position: Position = {
      symbol,
      net_quantity: net,
      average_entry_price: roundQuantity(average),
      realized_pnl: roundQuantity(realized),
      updated_at: fill.timestamp,
    };
    this.positions.set(symbol, position);
    this.emit('position_update', { ...position });
    return { ...position };
  }
}
