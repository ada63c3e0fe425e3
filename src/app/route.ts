import { NextResponse } from "next/server";

// GET / - Liveness check
export async function GET() {
  return NextResponse.json({ message: "Hello from the Blog Pipeline API!" });
}
