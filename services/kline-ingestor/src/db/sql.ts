const COLUMNS = `
  start_time, end_time, symbol, interval, first_trade_id, last_trade_id,
  open, high, low, close, volume, trade_count, quote_volume, created_at, updated_at
`;

/*
  Single-statement upsert keyed by (start_time, symbol, interval).
  Refinement policy: a write that would regress known trade coverage is rejected
  and the existing row comes back with outcome 'stale'.
    - both sides carry trade ids      -> apply iff last_trade_id does not go backwards
    - else both sides carry a count   -> apply iff trade_count does not go backwards
    - else                            -> apply (last applied wins)
  A write without trade ids (REST history) keeps the stored ids.
  xmax = 0 on the returned tuple means it was freshly inserted.
*/
export const UPSERT_KLINE = `
  WITH up AS (
    INSERT INTO kline_data (
      start_time, end_time, symbol, interval, first_trade_id, last_trade_id,
      open, high, low, close, volume, trade_count, quote_volume, created_at, updated_at
    )
    VALUES (to_timestamp($1::bigint / 1000.0), to_timestamp($2::bigint / 1000.0), $3, $4, $5, $6,
            $7::numeric, $8::numeric, $9::numeric, $10::numeric, $11::numeric, $12, $13::numeric, now(), now())
    ON CONFLICT (start_time, symbol, interval) DO UPDATE SET
      end_time       = EXCLUDED.end_time,
      first_trade_id = CASE WHEN EXCLUDED.last_trade_id > 0 THEN EXCLUDED.first_trade_id ELSE kline_data.first_trade_id END,
      last_trade_id  = CASE WHEN EXCLUDED.last_trade_id > 0 THEN EXCLUDED.last_trade_id  ELSE kline_data.last_trade_id  END,
      open           = EXCLUDED.open,
      high           = EXCLUDED.high,
      low            = EXCLUDED.low,
      close          = EXCLUDED.close,
      volume         = EXCLUDED.volume,
      trade_count    = EXCLUDED.trade_count,
      quote_volume   = EXCLUDED.quote_volume,
      updated_at     = now()
    WHERE CASE
      WHEN EXCLUDED.last_trade_id > 0 AND kline_data.last_trade_id > 0
        THEN EXCLUDED.last_trade_id >= kline_data.last_trade_id
      WHEN EXCLUDED.trade_count IS NOT NULL AND kline_data.trade_count IS NOT NULL
        THEN EXCLUDED.trade_count >= kline_data.trade_count
      ELSE TRUE
    END
    RETURNING ${COLUMNS}, CASE WHEN xmax::text = '0' THEN 'inserted' ELSE 'updated' END AS outcome
  )
  SELECT * FROM up
  UNION ALL
  SELECT ${COLUMNS}, 'stale' AS outcome
  FROM kline_data
  WHERE start_time = to_timestamp($1::bigint / 1000.0) AND symbol = $3 AND interval = $4
    AND NOT EXISTS (SELECT 1 FROM up)
`;

