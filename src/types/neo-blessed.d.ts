// neo-blessed ships no typings; its API is the blessed API.
declare module "neo-blessed" {
  import blessed = require("blessed");
  export = blessed;
}
