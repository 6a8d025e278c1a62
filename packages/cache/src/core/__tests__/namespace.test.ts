import { NAMESPACE_SEPARATOR, namespaceKey } from "../namespace"

describe("namespaceKey", () => {
  it("joins namespace and key with the separator", () => {
    expect(NAMESPACE_SEPARATOR).toBe(":")
    expect(namespaceKey("sessions", "user:42")).toBe("sessions:user:42")
  })

  it("returns the key verbatim without a namespace", () => {
    expect(namespaceKey("", "user:42")).toBe("user:42")
  })

  it("does not trim or escape anything", () => {
    expect(namespaceKey(" a ", "")).toBe(" a :")
  })
})
