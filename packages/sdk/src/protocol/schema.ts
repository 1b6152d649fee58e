export * from "capability-session-specification";
