export {
  type PresenceListener,
  Roster,
  type RosterHooks,
  type RosterOptions,
  type RosterRunOptions,
} from "./roster.js";
