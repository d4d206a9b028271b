import { describe, it, expect } from "vitest";
import { checkr, gusto, quickbooks, ramp, tripactions } from "@cio/connector";
import { backgroundCheckFromReport, checkTypeOf } from "./background-checks.js";
import { bookingFromTripActions } from "./bookings.js";
import { employeeFromGusto } from "./employees.js";
import { accountsPayableFromBillPayment, paidBillIds, totalCostPerMonth, transactionFromRamp } from "./finance.js";

describe("record mappings", () => {
  describe("bookingFromTripActions", () => {
    it("should map a booking", () => {
      const booking = tripactions.BookingSchema.parse({
        uuid: "b-1",
        created: "2024-02-01T10:00:00Z",
        lastModified: "2024-02-02T10:00:00Z",
        bookingType: "FLIGHT",
        bookingStatus: "TICKETED",
        bookingId: "CONF123",
        preferredVendor: "Y",
        corporateDiscountUsed: "N",
        startDate: "2024-03-10",
        passengers: [{ person: { email: "ada@example.com" } }, { person: null }],
        booker: { email: "grace@example.com" },
        origin: { airportCode: "SFO" },
        destination: null,
        grandTotal: 420.5,
        optimalPrice: null,
      });

      const record = bookingFromTripActions(booking, 3);

      expect(record).toMatchObject({
        booking_id: "b-1",
        confirmation_id: "CONF123",
        type: "FLIGHT",
        is_preferred_vendor: true,
        used_corporate_discount: false,
        start_date: "2024-03-10",
        end_date: "",
        passengers: ["ada@example.com"],
        booker: "grace@example.com",
        origin: "SFO",
        destination: "",
        grand_total: 420.5,
        optimal_price: 0,
        cancelled_at: null,
        cio_company_id: 3,
      });
    });
  });

  describe("transactionFromRamp", () => {
    it("should resolve the card holder's email", () => {
      const transaction = ramp.TransactionSchema.parse({
        id: "t-1",
        amount: 12.34,
        merchant_name: "Coffee",
        sk_category_id: 42,
        receipts: ["https://receipts.example.com/1"],
        user_transaction_time: "2024-02-01T08:00:00Z",
        card_holder: { user_id: "u-1" },
      });

      const record = transactionFromRamp(transaction, new Map([["u-1", "ada@example.com"]]), 3);

      expect(record).toMatchObject({
        transaction_id: "t-1",
        card_vendor: "Ramp",
        employee_email: "ada@example.com",
        amount: 12.34,
        category_id: "42",
        time: new Date("2024-02-01T08:00:00Z"),
        receipts: ["https://receipts.example.com/1"],
      });
    });
  });

  describe("bill payments", () => {
    const payment = quickbooks.BillPaymentSchema.parse({
      Id: "55",
      TxnDate: "2024-02-15",
      TotalAmt: 900,
      PayType: "Check",
      VendorRef: { value: "v-1", name: "Acme" },
      CheckPayment: { BankAccountRef: { value: "a-1", name: "Checking" } },
      Line: [
        { Amount: 600, LinkedTxn: [{ TxnId: "b-1", TxnType: "Bill" }] },
        { Amount: 300, LinkedTxn: [{ TxnId: "c-1", TxnType: "VendorCredit" }, { TxnId: "b-2", TxnType: "Bill" }] },
      ],
    });

    it("should list the paid bills", () => {
      expect(paidBillIds(payment)).toEqual(["b-1", "b-2"]);
    });

    it("should fall back to the payment id without a doc number", () => {
      const record = accountsPayableFromBillPayment(payment, ["https://files.example.com/inv.pdf"], 3);

      expect(record).toEqual({
        confirmation_number: "55",
        vendor: "Acme",
        amount: 900,
        currency: "USD",
        date: "2024-02-15",
        payment_type: "Check",
        account: "Checking",
        notes: "",
        invoices: ["https://files.example.com/inv.pdf"],
        cio_company_id: 3,
      });
    });
  });

  it("should total per-seat and flat costs", () => {
    expect(totalCostPerMonth({ cost_per_user_per_month: 12.5, users: 4, flat_cost_per_month: 100 })).toBe(150);
  });

  describe("employeeFromGusto", () => {
    it("should take the title and start date from the primary job", () => {
      const employee = gusto.GustoEmployeeSchema.parse({
        id: 101,
        first_name: "Ada",
        last_name: "Lovelace",
        email: " Ada@Example.com ",
        manager_id: 7,
        jobs: [
          { id: 1, title: "Intern", hire_date: "2020-01-01" },
          { id: 2, title: "Engineer", hire_date: "2021-06-01", primary: true },
        ],
        onboarded: true,
      });

      expect(employeeFromGusto(employee, 3)).toMatchObject({
        email: "ada@example.com",
        gusto_id: "101",
        job_title: "Engineer",
        start_date: "2021-06-01",
        manager_gusto_id: "7",
        onboarded: true,
        terminated: false,
      });
    });

    it("should skip an employee without an email", () => {
      const employee = gusto.GustoEmployeeSchema.parse({ id: 102, first_name: "No", last_name: "Email", email: null });

      expect(employeeFromGusto(employee, 3)).toBeNull();
    });
  });

  describe("background checks", () => {
    it("should classify packages", () => {
      expect(checkTypeOf("tasker_premium_criminal")).toBe("criminal");
      expect(checkTypeOf("driver_motor_vehicle_report")).toBe("motor_vehicle");
      expect(checkTypeOf("basic_plus")).toBe("other");
    });

    it("should map a candidate report", () => {
      const candidate = checkr.CandidateSchema.parse({ id: "c-1", first_name: "Ada", last_name: "Lovelace", email: "ada@example.com" });
      const report = checkr.ReportSchema.parse({
        id: "r-1",
        status: "complete",
        result: "clear",
        package: "tasker_premium_criminal",
        candidate_id: "c-1",
        created_at: "2024-02-01T00:00:00Z",
        completed_at: null,
      });

      expect(backgroundCheckFromReport(candidate, report, 3)).toEqual({
        candidate_id: "c-1",
        report_id: "r-1",
        email: "ada@example.com",
        first_name: "Ada",
        last_name: "Lovelace",
        status: "complete",
        result: "clear",
        adjudication: "",
        package: "tasker_premium_criminal",
        check_type: "criminal",
        created_at: new Date("2024-02-01T00:00:00Z"),
        completed_at: null,
        cio_company_id: 3,
      });
    });
  });
});
