import { describe, it, expect } from "vitest";
import { parseHostSpec, formatTarget } from "../host-spec";
import { ConfigurationError } from "../errors";

describe("parseHostSpec", () => {
  it("parses user, host and port", () => {
    expect(parseHostSpec("admin@10.0.0.1:2222")).toEqual({
      token: "admin@10.0.0.1:2222",
      user: "admin",
      host: "10.0.0.1",
      port: 2222,
    });
  });

  it("defaults user to admin and port to 22", () => {
    expect(parseHostSpec("10.0.0.1")).toEqual({
      token: "10.0.0.1",
      user: "admin",
      host: "10.0.0.1",
      port: 22,
    });
  });

  it("defaults port when only user is given", () => {
    const spec = parseHostSpec("user@host");
    expect(spec.user).toBe("user");
    expect(spec.host).toBe("host");
    expect(spec.port).toBe(22);
  });

  it("splits the user on the first @", () => {
    const spec = parseHostSpec("ops@team@router1");
    expect(spec.user).toBe("ops");
    expect(spec.host).toBe("team@router1");
  });

  it("splits the port on the last :", () => {
    const spec = parseHostSpec("admin@fe80::1:8022");
    expect(spec.host).toBe("fe80::1");
    expect(spec.port).toBe(8022);
  });

  it("is a pure function", () => {
    expect(parseHostSpec("netops@core-sw:2200")).toEqual(parseHostSpec("netops@core-sw:2200"));
  });

  it("rejects a non-numeric port", () => {
    expect(() => parseHostSpec("router1:ssh")).toThrow(ConfigurationError);
    expect(() => parseHostSpec("router1:ssh")).toThrow('port "ssh" is not a number');
  });

  it("rejects an empty port", () => {
    expect(() => parseHostSpec("router1:")).toThrow('port "" is not a number');
  });

  it("rejects port 0 and ports above 65535", () => {
    expect(() => parseHostSpec("router1:0")).toThrow("out of range");
    expect(() => parseHostSpec("router1:65536")).toThrow("out of range");
  });

  it("rejects an empty hostname", () => {
    expect(() => parseHostSpec("admin@")).toThrow("missing hostname");
    expect(() => parseHostSpec(":22")).toThrow("missing hostname");
  });

  it("rejects a user or hostname that would be read as an option", () => {
    expect(() => parseHostSpec("-oProxyCommand=touch /tmp/x@r1")).toThrow(ConfigurationError);
    expect(() => parseHostSpec("-oProxyCommand=touch /tmp/x@r1")).toThrow('must not start with "-"');
    expect(() => parseHostSpec("-oProxyCommand=id")).toThrow('must not start with "-"');
    expect(() => parseHostSpec("admin@-oProxyCommand=id:22")).toThrow('must not start with "-"');
  });

  it("rejects an empty user", () => {
    expect(() => parseHostSpec("@router1")).toThrow("empty user");
  });
});

describe("formatTarget", () => {
  it("renders user@host without the port", () => {
    expect(formatTarget(parseHostSpec("backup@192.168.88.1:2022"))).toBe("backup@192.168.88.1");
  });
});
