export type RequestInitWithSignal = Omit<RequestInit, "method" | "body">;

export type JsonFormat = "json" | "compact";
