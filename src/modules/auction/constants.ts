export const MIN_DURATION_SEC = 120;
export const MIN_EXTENSION_SEC = 30;

// a bid arriving with less than this left on the clock extends the deadline
export const SNIPING_WINDOW_SEC = 60;

export const MIN_INCREMENT_PERCENT = 5;
export const COMMISSION_PERCENT = 2;
